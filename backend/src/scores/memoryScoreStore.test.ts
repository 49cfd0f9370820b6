import test from 'node:test';
import assert from 'node:assert/strict';

import type { NewScoreRecord } from '../game/types.js';
import { InMemoryScoreStore } from './memoryScoreStore.js';

const entry = (playerName: string, score: number, createdAt: number, gameType: NewScoreRecord['gameType'] = 'number_guess'): NewScoreRecord => ({
  playerName,
  gameType,
  score,
  attempts: 1,
  createdAt
});

const seed = () => {
  const store = new InMemoryScoreStore();
  store.record(entry('A', 50, 300));
  store.record(entry('B', 80, 200));
  store.record(entry('C', 50, 100));
  store.record(entry('D', 80, 400));
  store.record(entry('E', 999, 500, 'tic_tac_toe'));
  return store;
};

test('record assigns increasing ids and returns immutable records', () => {
  const store = new InMemoryScoreStore();
  const first = store.record(entry('Ada', 10, 1));
  const second = store.record(entry('Bo', 20, 2));

  assert.equal(first.id, 1);
  assert.equal(second.id, 2);
  assert.ok(Object.isFrozen(first));
});

test('topScores orders by score, then earliest timestamp, within one game', () => {
  const store = seed();

  assert.deepEqual(
    store.topScores('number_guess', 10).map((record) => record.playerName),
    ['B', 'D', 'C', 'A']
  );
  assert.deepEqual(
    store.topScores('number_guess', 2).map((record) => record.playerName),
    ['B', 'D']
  );
  assert.deepEqual(store.topScores('rock_paper_scissors', 10), []);
});

test('topScores breaks full ties by insertion order', () => {
  const store = new InMemoryScoreStore();
  store.record(entry('first', 70, 100));
  store.record(entry('second', 70, 100));

  assert.deepEqual(
    store.topScores('number_guess', 10).map((record) => record.playerName),
    ['first', 'second']
  );
});

test('recentScores lists newest records across games', () => {
  const store = seed();

  assert.deepEqual(
    store.recentScores(3).map((record) => record.playerName),
    ['E', 'D', 'A']
  );
});

test('resetAll removes every record and is idempotent', () => {
  const store = seed();

  assert.equal(store.resetAll(), 5);
  assert.equal(store.resetAll(), 0);
  assert.deepEqual(store.recentScores(10), []);
});
