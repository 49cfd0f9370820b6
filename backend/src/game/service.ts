import { timingSafeEqual } from 'node:crypto';
import {
  GameTypeSchema,
  MoveResponseSchema,
  NumberGuessMoveSchema,
  RockPaperScissorsMoveSchema,
  TicTacToeMoveSchema,
  type MoveOutcome,
  type MoveResponse
} from '@arcade/shared';
import { StorageError, UnauthorizedError } from '../errors.js';
import type { ScoreStore } from '../scores/store.js';
import { applyMove } from './engine.js';
import type { RandomSource } from './random.js';
import type { GameStateRepository } from './repository.js';
import { attemptsForOutcome, scoreOutcome } from './scorer.js';
import { toScorePayload, toStateSummary } from './serializers.js';
import type { GameMove, GameState, GameType, ScoreRecord, TerminalOutcome } from './types.js';

export const DEFAULT_PLAYER_NAME = 'Anonymous';

export interface GameServiceDeps {
  repository: GameStateRepository;
  scores: ScoreStore;
  random: RandomSource;
  now?: () => number;
}

export const parseGameType = (value: unknown): GameType => GameTypeSchema.parse(value);

export const parseMove = (gameType: GameType, body: unknown): GameMove => {
  switch (gameType) {
    case 'number_guess': {
      const move = NumberGuessMoveSchema.parse(body);
      return { gameType, playerName: move.playerName ?? DEFAULT_PLAYER_NAME, guess: move.guess };
    }
    case 'tic_tac_toe': {
      const move = TicTacToeMoveSchema.parse(body);
      return { gameType, playerName: move.playerName ?? DEFAULT_PLAYER_NAME, position: move.position };
    }
    case 'rock_paper_scissors': {
      const move = RockPaperScissorsMoveSchema.parse(body);
      return { gameType, playerName: move.playerName ?? DEFAULT_PLAYER_NAME, choice: move.choice };
    }
  }
};

const toMoveOutcome = (outcome: TerminalOutcome | null): MoveOutcome | null => {
  if (!outcome) {
    return null;
  }

  switch (outcome.gameType) {
    case 'number_guess':
      return outcome.result;
    case 'tic_tac_toe':
      return outcome.status;
    case 'rock_paper_scissors':
      return outcome.outcome;
  }
};

const describeMove = (state: GameState, outcome: TerminalOutcome | null, score: number | null): string => {
  switch (state.gameType) {
    case 'number_guess':
      if (state.lastResult === 'correct') {
        return `Congratulations! You guessed it in ${state.attempts} attempts! Score: ${score ?? 0}`;
      }
      return state.lastResult === 'too_low' ? 'Too low! Try a higher number.' : 'Too high! Try a lower number.';
    case 'tic_tac_toe':
      if (state.winner === 'X') {
        return 'You win!';
      }
      if (state.winner === 'O') {
        return 'Computer wins!';
      }
      return state.winner === 'draw' ? "It's a draw!" : 'Your turn.';
    case 'rock_paper_scissors': {
      const round = state.lastRound;
      if (!round || !outcome) {
        return 'Make your choice.';
      }
      const verdict = round.outcome === 'win' ? 'You win!' : round.outcome === 'lose' ? 'You lose!' : "It's a tie!";
      return `You chose ${round.playerChoice}, computer chose ${round.computerChoice}. ${verdict}`;
    }
  }
};

const recordScore = (
  scores: ScoreStore,
  move: GameMove,
  outcome: TerminalOutcome,
  score: number,
  createdAt: number
): ScoreRecord => {
  try {
    return scores.record({
      playerName: move.playerName,
      gameType: move.gameType,
      score,
      attempts: attemptsForOutcome(outcome),
      createdAt
    });
  } catch (error) {
    throw error instanceof StorageError ? error : new StorageError('Unable to record score', { cause: error });
  }
};

/**
 * Applies one move for a session. The new state is saved before the score is
 * recorded; a storage failure is rethrown with the finished move attached.
 */
export const submitMove = (sessionId: string, move: GameMove, deps: GameServiceDeps): MoveResponse => {
  const now = deps.now ?? Date.now;
  const result = applyMove(deps.repository.get(sessionId, move.gameType), move, deps.random);
  deps.repository.save(sessionId, result.state);

  const score = result.outcome ? scoreOutcome(result.outcome) : null;
  const response: MoveResponse = {
    state: toStateSummary(result.state),
    outcome: toMoveOutcome(result.outcome),
    score,
    record: null,
    message: describeMove(result.state, result.outcome, score)
  };

  if (!result.outcome || !score) {
    return MoveResponseSchema.parse(response);
  }

  try {
    const record = recordScore(deps.scores, move, result.outcome, score, now());
    return MoveResponseSchema.parse({ ...response, record: toScorePayload(record) });
  } catch (error) {
    if (error instanceof StorageError) {
      throw error.withResult(MoveResponseSchema.parse(response));
    }
    throw error;
  }
};

export const getGameState = (sessionId: string, gameType: GameType, repository: GameStateRepository) => {
  const state = repository.get(sessionId, gameType);
  return state ? toStateSummary(state) : null;
};

export const resetGame = (sessionId: string, gameType: GameType, repository: GameStateRepository): boolean =>
  repository.delete(sessionId, gameType);

export const listTopScores = (gameType: GameType, limit: number, scores: ScoreStore) =>
  scores.topScores(gameType, limit).map(toScorePayload);

export const listRecentScores = (limit: number, scores: ScoreStore) =>
  scores.recentScores(limit).map(toScorePayload);

export const assertAdminToken = (provided: string | undefined, expected: string | null): void => {
  if (!expected) {
    throw new UnauthorizedError('Administrative reset is disabled');
  }

  const given = Buffer.from(provided ?? '');
  const wanted = Buffer.from(expected);
  if (given.length !== wanted.length || !timingSafeEqual(given, wanted)) {
    throw new UnauthorizedError('Invalid admin token');
  }
};

export const resetScores = (scores: ScoreStore): number => scores.resetAll();

/** Drops every session whose games have been idle longer than `ttlMs`. */
export const sweepIdleSessions = (repository: GameStateRepository, ttlMs: number, now: number = Date.now()): number => {
  const idle = repository.idleSessions(now - ttlMs);
  idle.forEach((sessionId) => {
    repository.clearSession(sessionId);
  });
  return idle.length;
};
