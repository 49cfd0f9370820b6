import type { RockPaperScissorsState, TerminalOutcome } from './types.js';

export const NUMBER_GUESS_BASE_SCORE = 100;
export const NUMBER_GUESS_MIN_SCORE = 10;
export const TIC_TAC_TOE_WIN_SCORE = 100;
export const RPS_ROUND_WIN_SCORE = 10;

export const scoreNumberGuess = (attempts: number): number =>
  Math.max(NUMBER_GUESS_BASE_SCORE - attempts, NUMBER_GUESS_MIN_SCORE);

export const scoreTicTacToe = (status: 'win' | 'lose' | 'draw'): number =>
  status === 'win' ? TIC_TAC_TOE_WIN_SCORE : 0;

export const scoreRPSRound = (outcome: 'win' | 'lose' | 'tie'): number =>
  outcome === 'win' ? RPS_ROUND_WIN_SCORE : 0;

export const scoreOutcome = (outcome: TerminalOutcome): number => {
  switch (outcome.gameType) {
    case 'number_guess':
      return scoreNumberGuess(outcome.attempts);
    case 'tic_tac_toe':
      return scoreTicTacToe(outcome.status);
    case 'rock_paper_scissors':
      return scoreRPSRound(outcome.outcome);
  }
};

/** Attempts column stored alongside a score. */
export const attemptsForOutcome = (outcome: TerminalOutcome): number => {
  switch (outcome.gameType) {
    case 'number_guess':
      return outcome.attempts;
    case 'tic_tac_toe':
      return 1;
    case 'rock_paper_scissors':
      return outcome.gamesPlayed;
  }
};

export const winRate = (state: Pick<RockPaperScissorsState, 'wins' | 'gamesPlayed'>): number =>
  state.gamesPlayed > 0 ? Math.round((state.wins / state.gamesPlayed) * 1000) / 10 : 0;
