import { GUESS_MAX, GUESS_MIN, GameStateSummarySchema, ScoreRecordSchema } from '@arcade/shared';
import { winRate } from './scorer.js';
import type { GameState, ScoreRecord } from './types.js';

const toRawSummary = (state: GameState) => {
  switch (state.gameType) {
    case 'number_guess':
      return {
        gameType: state.gameType,
        attempts: state.attempts,
        finished: state.finished,
        lastResult: state.lastResult,
        range: { min: GUESS_MIN, max: GUESS_MAX },
        createdAt: state.createdAt,
        updatedAt: state.updatedAt
      };
    case 'tic_tac_toe':
      return {
        gameType: state.gameType,
        board: [...state.board],
        turn: state.turn,
        finished: state.finished,
        winner: state.winner,
        computerMove: state.computerMove,
        createdAt: state.createdAt,
        updatedAt: state.updatedAt
      };
    case 'rock_paper_scissors':
      return {
        gameType: state.gameType,
        wins: state.wins,
        losses: state.losses,
        ties: state.ties,
        gamesPlayed: state.gamesPlayed,
        winRate: winRate(state),
        lastRound: state.lastRound,
        createdAt: state.createdAt,
        updatedAt: state.updatedAt
      };
  }
};

/** Client-facing view of a game; the number-guess secret never leaves the server. */
export const toStateSummary = (state: GameState) => GameStateSummarySchema.parse(toRawSummary(state));

export const toScorePayload = (record: ScoreRecord) => ScoreRecordSchema.parse(record);
