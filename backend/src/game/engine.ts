import { GUESS_MAX, GUESS_MIN } from '@arcade/shared';
import { InvalidMoveError } from '../errors.js';
import type { RandomSource } from './random.js';
import {
  drawComputerChoice,
  emptyBoard,
  evaluateBoardMove,
  evaluateGuess,
  evaluateRPS,
  pickComputerMove
} from './rules.js';
import {
  COMPUTER_MARK,
  PLAYER_MARK,
  type BoardEvaluation,
  type GameMove,
  type GameState,
  type GameType,
  type MoveResult,
  type NumberGuessState,
  type RockPaperScissorsState,
  type RpsChoice,
  type TicTacToeState
} from './types.js';

const now = (): number => Date.now();

const withTimestamp = <S extends GameState>(state: S): S => ({
  ...state,
  updatedAt: now()
});

export const createNumberGuess = (random: RandomSource): NumberGuessState => {
  const timestamp = now();

  return {
    gameType: 'number_guess',
    secret: random.nextInt(GUESS_MIN, GUESS_MAX),
    attempts: 0,
    finished: false,
    lastResult: null,
    createdAt: timestamp,
    updatedAt: timestamp
  };
};

export const createTicTacToe = (): TicTacToeState => {
  const timestamp = now();

  return {
    gameType: 'tic_tac_toe',
    board: emptyBoard(),
    turn: 'player',
    finished: false,
    winner: null,
    computerMove: null,
    createdAt: timestamp,
    updatedAt: timestamp
  };
};

export const createRockPaperScissors = (): RockPaperScissorsState => {
  const timestamp = now();

  return {
    gameType: 'rock_paper_scissors',
    wins: 0,
    losses: 0,
    ties: 0,
    gamesPlayed: 0,
    lastRound: null,
    createdAt: timestamp,
    updatedAt: timestamp
  };
};

export const createGameState = (gameType: GameType, random: RandomSource): GameState => {
  switch (gameType) {
    case 'number_guess':
      return createNumberGuess(random);
    case 'tic_tac_toe':
      return createTicTacToe();
    case 'rock_paper_scissors':
      return createRockPaperScissors();
  }
};

export const applyGuess = (state: NumberGuessState, guess: number): MoveResult<NumberGuessState> => {
  if (state.finished) {
    throw new InvalidMoveError('This number guessing game is already finished');
  }

  const evaluation = evaluateGuess(state.secret, guess, state.attempts);
  const finished = evaluation.result === 'correct';

  return {
    state: withTimestamp({
      ...state,
      attempts: evaluation.attempts,
      finished,
      lastResult: evaluation.result
    }),
    outcome: finished ? { gameType: 'number_guess', result: 'correct', attempts: evaluation.attempts } : null
  };
};

const finishBoard = (
  state: TicTacToeState,
  evaluation: BoardEvaluation,
  computerMove: number | null
): MoveResult<TicTacToeState> => {
  const { status } = evaluation;
  const base = { ...state, board: evaluation.board, computerMove };

  if (status.kind === 'ongoing') {
    return { state: withTimestamp<TicTacToeState>({ ...base, turn: 'player' }), outcome: null };
  }

  if (status.kind === 'draw') {
    return {
      state: withTimestamp<TicTacToeState>({ ...base, finished: true, winner: 'draw' }),
      outcome: { gameType: 'tic_tac_toe', status: 'draw' }
    };
  }

  return {
    state: withTimestamp<TicTacToeState>({ ...base, finished: true, winner: status.mark }),
    outcome: { gameType: 'tic_tac_toe', status: status.mark === PLAYER_MARK ? 'win' : 'lose' }
  };
};

export const applyBoardMove = (state: TicTacToeState, position: number): MoveResult<TicTacToeState> => {
  if (state.finished) {
    throw new InvalidMoveError('This tic-tac-toe game is already finished');
  }

  const afterPlayer = evaluateBoardMove(state.board, position, PLAYER_MARK);
  if (afterPlayer.status.kind !== 'ongoing') {
    return finishBoard(state, afterPlayer, null);
  }

  const computerMove = pickComputerMove(afterPlayer.board);
  if (computerMove === null) {
    return finishBoard(state, afterPlayer, null);
  }

  const afterComputer = evaluateBoardMove(afterPlayer.board, computerMove, COMPUTER_MARK);
  return finishBoard(state, afterComputer, computerMove);
};

export const applyRPSRound = (
  state: RockPaperScissorsState,
  playerChoice: RpsChoice,
  random: RandomSource
): MoveResult<RockPaperScissorsState> => {
  const computerChoice = drawComputerChoice(random);
  const outcome = evaluateRPS(playerChoice, computerChoice);
  const gamesPlayed = state.gamesPlayed + 1;

  return {
    state: withTimestamp({
      ...state,
      wins: state.wins + (outcome === 'win' ? 1 : 0),
      losses: state.losses + (outcome === 'lose' ? 1 : 0),
      ties: state.ties + (outcome === 'tie' ? 1 : 0),
      gamesPlayed,
      lastRound: { playerChoice, computerChoice, outcome }
    }),
    outcome: { gameType: 'rock_paper_scissors', outcome, gamesPlayed }
  };
};

export const isFinished = (state: GameState): boolean =>
  state.gameType === 'rock_paper_scissors' ? false : state.finished;

/**
 * Applies a move to the current state, starting a fresh game when there is
 * none yet or the previous one has finished.
 */
export const applyMove = (
  current: GameState | undefined,
  move: GameMove,
  random: RandomSource
): MoveResult => {
  const live =
    current && current.gameType === move.gameType && !isFinished(current)
      ? current
      : createGameState(move.gameType, random);

  switch (move.gameType) {
    case 'number_guess': {
      if (live.gameType !== 'number_guess') {
        throw new Error('State does not match number_guess move');
      }
      return applyGuess(live, move.guess);
    }
    case 'tic_tac_toe': {
      if (live.gameType !== 'tic_tac_toe') {
        throw new Error('State does not match tic_tac_toe move');
      }
      return applyBoardMove(live, move.position);
    }
    case 'rock_paper_scissors': {
      if (live.gameType !== 'rock_paper_scissors') {
        throw new Error('State does not match rock_paper_scissors move');
      }
      return applyRPSRound(live, move.choice, random);
    }
  }
};
