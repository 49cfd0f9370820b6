import { BOARD_SIZE, GUESS_MAX, GUESS_MIN } from '@arcade/shared';
import { InvalidInputError, InvalidMoveError } from '../errors.js';
import type { RandomSource } from './random.js';
import {
  COMPUTER_MARK,
  PLAYER_MARK,
  type Board,
  type BoardEvaluation,
  type BoardMark,
  type GuessEvaluation,
  type RpsChoice,
  type RpsOutcome
} from './types.js';

export const WINNING_LINES: ReadonlyArray<readonly [number, number, number]> = [
  [0, 1, 2],
  [3, 4, 5],
  [6, 7, 8],
  [0, 3, 6],
  [1, 4, 7],
  [2, 5, 8],
  [0, 4, 8],
  [2, 4, 6]
];

const CENTER_CELL = 4;

export const RPS_CHOICES: readonly RpsChoice[] = ['rock', 'paper', 'scissors'];

const BEATS: Record<RpsChoice, RpsChoice> = {
  rock: 'scissors',
  scissors: 'paper',
  paper: 'rock'
};

export const emptyBoard = (): Board => Array.from({ length: BOARD_SIZE }, () => null);

export const evaluateGuess = (secret: number, guess: number, attempts: number): GuessEvaluation => {
  if (!Number.isInteger(guess) || guess < GUESS_MIN || guess > GUESS_MAX) {
    throw new InvalidInputError(`Guess must be a whole number between ${GUESS_MIN} and ${GUESS_MAX}`);
  }

  const result = guess === secret ? 'correct' : guess > secret ? 'too_high' : 'too_low';
  return { result, attempts: attempts + 1 };
};

export const findWinner = (board: Board): BoardMark | null => {
  for (const [a, b, c] of WINNING_LINES) {
    const mark = board[a];
    if (mark && mark === board[b] && mark === board[c]) {
      return mark;
    }
  }
  return null;
};

export const isBoardFull = (board: Board): boolean => board.every((cell) => cell !== null);

export const evaluateBoardMove = (board: Board, cellIndex: number, mark: BoardMark): BoardEvaluation => {
  if (board.length !== BOARD_SIZE) {
    throw new InvalidMoveError(`Board must have exactly ${BOARD_SIZE} cells`);
  }

  if (!Number.isInteger(cellIndex) || cellIndex < 0 || cellIndex >= BOARD_SIZE) {
    throw new InvalidMoveError(`Cell ${cellIndex} is outside the board (0-${BOARD_SIZE - 1})`);
  }

  if (board[cellIndex] !== null) {
    throw new InvalidMoveError(`Cell ${cellIndex} is already occupied`);
  }

  const nextBoard = board.map((cell, index) => (index === cellIndex ? mark : cell));
  const winner = findWinner(nextBoard);

  if (winner) {
    return { board: nextBoard, status: { kind: 'win', mark: winner } };
  }

  if (isBoardFull(nextBoard)) {
    return { board: nextBoard, status: { kind: 'draw' } };
  }

  return { board: nextBoard, status: { kind: 'ongoing' } };
};

const findCompletingCell = (board: Board, mark: BoardMark): number | null => {
  for (let index = 0; index < board.length; index += 1) {
    if (board[index] !== null) {
      continue;
    }

    const candidate = board.map((cell, position) => (position === index ? mark : cell));
    if (findWinner(candidate) === mark) {
      return index;
    }
  }
  return null;
};

/**
 * Greedy reply for the computer: finish its own line, else block the
 * player's line, else take the center, else the lowest free cell.
 * Returns null when the board is full.
 */
export const pickComputerMove = (
  board: Board,
  computer: BoardMark = COMPUTER_MARK,
  opponent: BoardMark = PLAYER_MARK
): number | null => {
  const winning = findCompletingCell(board, computer);
  if (winning !== null) {
    return winning;
  }

  const blocking = findCompletingCell(board, opponent);
  if (blocking !== null) {
    return blocking;
  }

  if (board[CENTER_CELL] === null) {
    return CENTER_CELL;
  }

  const firstEmpty = board.findIndex((cell) => cell === null);
  return firstEmpty === -1 ? null : firstEmpty;
};

export const evaluateRPS = (playerChoice: RpsChoice, computerChoice: RpsChoice): RpsOutcome => {
  if (playerChoice === computerChoice) {
    return 'tie';
  }
  return BEATS[playerChoice] === computerChoice ? 'win' : 'lose';
};

export const drawComputerChoice = (random: RandomSource): RpsChoice => {
  const choice = RPS_CHOICES[random.nextInt(0, RPS_CHOICES.length - 1)];
  if (!choice) {
    throw new Error('Random source returned an index outside the choice list');
  }
  return choice;
};
