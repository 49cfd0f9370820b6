import type { GameType, NewScoreRecord, ScoreRecord } from '../game/types.js';
import { compareByRank, compareByRecency, type ScoreStore } from './store.js';

export class InMemoryScoreStore implements ScoreStore {
  private records: ScoreRecord[] = [];
  private nextId = 1;

  record(entry: NewScoreRecord): ScoreRecord {
    const saved: ScoreRecord = Object.freeze({ ...entry, id: this.nextId });
    this.nextId += 1;
    this.records.push(saved);
    return saved;
  }

  topScores(gameType: GameType, limit: number): ScoreRecord[] {
    return this.records
      .filter((entry) => entry.gameType === gameType)
      .sort(compareByRank)
      .slice(0, limit);
  }

  recentScores(limit: number): ScoreRecord[] {
    return [...this.records].sort(compareByRecency).slice(0, limit);
  }

  resetAll(): number {
    const removed = this.records.length;
    this.records = [];
    return removed;
  }
}
