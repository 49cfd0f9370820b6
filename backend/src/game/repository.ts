import type { GameState, GameType } from './types.js';

/** Live game state keyed by (session id, game type). */
export interface GameStateRepository {
  get(sessionId: string, gameType: GameType): GameState | undefined;
  save(sessionId: string, state: GameState): void;
  delete(sessionId: string, gameType: GameType): boolean;
  clearSession(sessionId: string): number;
  /** Session ids whose most recent read or write is older than `cutoff`. */
  idleSessions(cutoff: number): string[];
}
