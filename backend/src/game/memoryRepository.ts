import type { GameStateRepository } from './repository.js';
import type { GameState, GameType } from './types.js';

export class InMemoryGameStateRepository implements GameStateRepository {
  private readonly sessions = new Map<string, Map<GameType, GameState>>();
  private readonly lastSeen = new Map<string, number>();
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  /** Reads count as activity, so a session that only polls stays alive. */
  get(sessionId: string, gameType: GameType): GameState | undefined {
    const games = this.sessions.get(sessionId);
    if (!games) {
      return undefined;
    }
    this.lastSeen.set(sessionId, this.now());
    return games.get(gameType);
  }

  save(sessionId: string, state: GameState): void {
    let games = this.sessions.get(sessionId);
    if (!games) {
      games = new Map();
      this.sessions.set(sessionId, games);
    }
    games.set(state.gameType, state);
    this.lastSeen.set(sessionId, this.now());
  }

  delete(sessionId: string, gameType: GameType): boolean {
    const games = this.sessions.get(sessionId);
    if (!games) {
      return false;
    }

    const removed = games.delete(gameType);
    if (games.size === 0) {
      this.sessions.delete(sessionId);
      this.lastSeen.delete(sessionId);
    }
    return removed;
  }

  clearSession(sessionId: string): number {
    const count = this.sessions.get(sessionId)?.size ?? 0;
    this.sessions.delete(sessionId);
    this.lastSeen.delete(sessionId);
    return count;
  }

  idleSessions(cutoff: number): string[] {
    const idle: string[] = [];
    for (const [sessionId, games] of this.sessions.entries()) {
      const updates = [...games.values()].map((state) => state.updatedAt);
      const lastActivity = Math.max(this.lastSeen.get(sessionId) ?? 0, ...updates);
      if (lastActivity < cutoff) {
        idle.push(sessionId);
      }
    }
    return idle;
  }
}
