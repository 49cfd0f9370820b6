import Database from 'better-sqlite3';
import { GameTypeSchema } from '@arcade/shared';
import { z } from 'zod';
import { StorageError } from '../errors.js';
import type { GameType, NewScoreRecord, ScoreRecord } from '../game/types.js';
import type { ScoreStore } from './store.js';

const ScoreRowSchema = z.object({
  id: z.number().int(),
  player_name: z.string(),
  game_type: GameTypeSchema,
  score: z.number().int(),
  attempts: z.number().int(),
  created_at: z.number()
});

const toScoreRecord = (row: unknown): ScoreRecord => {
  const parsed = ScoreRowSchema.parse(row);
  return {
    id: parsed.id,
    playerName: parsed.player_name,
    gameType: parsed.game_type,
    score: parsed.score,
    attempts: parsed.attempts,
    createdAt: parsed.created_at
  };
};

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS scores (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    player_name TEXT NOT NULL,
    game_type TEXT NOT NULL,
    score INTEGER NOT NULL CHECK (score >= 0),
    attempts INTEGER NOT NULL DEFAULT 0,
    created_at INTEGER NOT NULL
  );
  CREATE INDEX IF NOT EXISTS scores_rank_idx ON scores (game_type, score DESC, created_at ASC);
`;

export class SqliteScoreStore implements ScoreStore {
  private readonly db: Database.Database;
  private readonly insertStatement: Database.Statement<unknown[], unknown>;
  private readonly topStatement: Database.Statement<unknown[], unknown>;
  private readonly recentStatement: Database.Statement<unknown[], unknown>;
  private readonly deleteStatement: Database.Statement<unknown[], unknown>;

  constructor(path: string) {
    this.db = new Database(path);
    if (path !== ':memory:') {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.exec(SCHEMA);

    this.insertStatement = this.db.prepare(
      `INSERT INTO scores (player_name, game_type, score, attempts, created_at)
       VALUES (@playerName, @gameType, @score, @attempts, @createdAt)
       RETURNING id, player_name, game_type, score, attempts, created_at`
    );
    this.topStatement = this.db.prepare(
      `SELECT id, player_name, game_type, score, attempts, created_at
       FROM scores
       WHERE game_type = ?
       ORDER BY score DESC, created_at ASC, id ASC
       LIMIT ?`
    );
    this.recentStatement = this.db.prepare(
      `SELECT id, player_name, game_type, score, attempts, created_at
       FROM scores
       ORDER BY created_at DESC, id DESC
       LIMIT ?`
    );
    this.deleteStatement = this.db.prepare('DELETE FROM scores');
  }

  record(entry: NewScoreRecord): ScoreRecord {
    try {
      return toScoreRecord(this.insertStatement.get(entry));
    } catch (error) {
      throw new StorageError('Unable to record score', { cause: error });
    }
  }

  topScores(gameType: GameType, limit: number): ScoreRecord[] {
    try {
      return this.topStatement.all(gameType, limit).map(toScoreRecord);
    } catch (error) {
      throw new StorageError('Unable to read top scores', { cause: error });
    }
  }

  recentScores(limit: number): ScoreRecord[] {
    try {
      return this.recentStatement.all(limit).map(toScoreRecord);
    } catch (error) {
      throw new StorageError('Unable to read recent scores', { cause: error });
    }
  }

  resetAll(): number {
    try {
      return this.deleteStatement.run().changes;
    } catch (error) {
      throw new StorageError('Unable to reset scores', { cause: error });
    }
  }

  close(): void {
    this.db.close();
  }
}
