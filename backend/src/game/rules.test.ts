import test from 'node:test';
import assert from 'node:assert/strict';

import { InvalidInputError, InvalidMoveError } from '../errors.js';
import type { RandomSource } from './random.js';
import {
  WINNING_LINES,
  drawComputerChoice,
  emptyBoard,
  evaluateBoardMove,
  evaluateGuess,
  evaluateRPS,
  findWinner,
  pickComputerMove
} from './rules.js';
import type { Board, BoardMark } from './types.js';

const _ = null;

const fixedIndex = (index: number): RandomSource => ({
  nextInt: () => index
});

test('evaluateGuess compares against the secret and counts the attempt', () => {
  assert.deepEqual(evaluateGuess(50, 60, 0), { result: 'too_high', attempts: 1 });
  assert.deepEqual(evaluateGuess(50, 40, 2), { result: 'too_low', attempts: 3 });
  assert.deepEqual(evaluateGuess(50, 50, 4), { result: 'correct', attempts: 5 });
});

test('evaluateGuess rejects guesses outside 1-100 and non-integers', () => {
  assert.throws(() => evaluateGuess(50, 0, 0), InvalidInputError);
  assert.throws(() => evaluateGuess(50, 101, 0), InvalidInputError);
  assert.throws(() => evaluateGuess(50, 4.5, 0), /whole number between 1 and 100/);
});

test('evaluateBoardMove detects a completed row for the moving mark', () => {
  const board: Board = ['X', 'X', _, 'O', 'O', _, _, _, _];
  const evaluation = evaluateBoardMove(board, 2, 'X');

  assert.deepEqual(evaluation.status, { kind: 'win', mark: 'X' });
  assert.deepEqual(evaluation.board, ['X', 'X', 'X', 'O', 'O', _, _, _, _]);
});

test('evaluateBoardMove reports a draw on a full board without a line', () => {
  const board: Board = ['X', 'O', 'X', 'X', 'O', 'O', 'O', 'X', _];
  const evaluation = evaluateBoardMove(board, 8, 'X');

  assert.deepEqual(evaluation.status, { kind: 'draw' });
  assert.equal(findWinner(evaluation.board), null);
});

test('evaluateBoardMove leaves the input board untouched', () => {
  const board = emptyBoard();
  const evaluation = evaluateBoardMove(board, 4, 'O');

  assert.equal(board[4], null);
  assert.equal(evaluation.board[4], 'O');
  assert.deepEqual(evaluation.status, { kind: 'ongoing' });
});

test('evaluateBoardMove rejects occupied, out-of-range and fractional cells', () => {
  const board: Board = ['X', _, _, _, _, _, _, _, _];

  assert.throws(() => evaluateBoardMove(board, 0, 'O'), /Cell 0 is already occupied/);
  assert.throws(() => evaluateBoardMove(board, -1, 'O'), InvalidMoveError);
  assert.throws(() => evaluateBoardMove(board, 9, 'O'), /outside the board/);
  assert.throws(() => evaluateBoardMove(board, 1.5, 'O'), InvalidMoveError);
  assert.throws(() => evaluateBoardMove(['X', _], 1, 'O'), /exactly 9 cells/);
});

test('evaluateBoardMove only reports a win when a full line exists', () => {
  const hasLine = (board: Board, mark: BoardMark) =>
    WINNING_LINES.some((line) => line.every((index) => board[index] === mark));

  const explore = (board: Board, mark: BoardMark, depth: number) => {
    if (depth === 0) {
      return;
    }

    board.forEach((cell, index) => {
      if (cell !== null) {
        return;
      }

      const { board: next, status } = evaluateBoardMove(board, index, mark);
      if (status.kind === 'win') {
        assert.ok(hasLine(next, status.mark));
        return;
      }

      assert.equal(hasLine(next, 'X') || hasLine(next, 'O'), false);
      if (status.kind === 'ongoing') {
        explore(next, mark === 'X' ? 'O' : 'X', depth - 1);
      }
    });
  };

  explore(emptyBoard(), 'X', 5);
});

test('pickComputerMove completes its own line before blocking', () => {
  const board: Board = ['O', 'O', _, 'X', 'X', _, 'X', _, _];
  assert.equal(pickComputerMove(board), 2);
});

test('pickComputerMove blocks the player line', () => {
  const board: Board = ['X', 'X', _, _, 'O', _, _, _, _];
  assert.equal(pickComputerMove(board), 2);
});

test('pickComputerMove takes the center, then the lowest free cell', () => {
  assert.equal(pickComputerMove(['X', _, _, _, _, _, _, _, _]), 4);
  assert.equal(pickComputerMove(['X', _, _, _, 'O', _, _, _, _]), 1);
});

test('pickComputerMove returns null on a full board', () => {
  assert.equal(pickComputerMove(['X', 'O', 'X', 'X', 'O', 'O', 'O', 'X', 'X']), null);
});

test('evaluateRPS follows rock > scissors > paper > rock', () => {
  assert.equal(evaluateRPS('rock', 'scissors'), 'win');
  assert.equal(evaluateRPS('paper', 'rock'), 'win');
  assert.equal(evaluateRPS('scissors', 'paper'), 'win');
  assert.equal(evaluateRPS('scissors', 'rock'), 'lose');
  assert.equal(evaluateRPS('rock', 'paper'), 'lose');
  assert.equal(evaluateRPS('paper', 'scissors'), 'lose');
  assert.equal(evaluateRPS('rock', 'rock'), 'tie');
  assert.equal(evaluateRPS('paper', 'paper'), 'tie');
  assert.equal(evaluateRPS('scissors', 'scissors'), 'tie');
});

test('drawComputerChoice maps the random index onto the choice list', () => {
  assert.equal(drawComputerChoice(fixedIndex(0)), 'rock');
  assert.equal(drawComputerChoice(fixedIndex(1)), 'paper');
  assert.equal(drawComputerChoice(fixedIndex(2)), 'scissors');
  assert.throws(() => drawComputerChoice(fixedIndex(3)), /outside the choice list/);
});
