import type { GameType, NewScoreRecord, ScoreRecord } from '../game/types.js';

export interface ScoreStore {
  record(entry: NewScoreRecord): ScoreRecord;
  topScores(gameType: GameType, limit: number): ScoreRecord[];
  recentScores(limit: number): ScoreRecord[];
  resetAll(): number;
}

/** Highest score first; equal scores keep the earlier record first. */
export const compareByRank = (left: ScoreRecord, right: ScoreRecord): number =>
  right.score - left.score || left.createdAt - right.createdAt || left.id - right.id;

export const compareByRecency = (left: ScoreRecord, right: ScoreRecord): number =>
  right.createdAt - left.createdAt || right.id - left.id;
