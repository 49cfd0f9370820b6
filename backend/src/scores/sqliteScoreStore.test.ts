import test from 'node:test';
import assert from 'node:assert/strict';
import { mkdtempSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { StorageError } from '../errors.js';
import type { NewScoreRecord } from '../game/types.js';
import { SqliteScoreStore } from './sqliteScoreStore.js';

const entry = (playerName: string, score: number, createdAt: number, gameType: NewScoreRecord['gameType'] = 'number_guess'): NewScoreRecord => ({
  playerName,
  gameType,
  score,
  attempts: 3,
  createdAt
});

test('SqliteScoreStore records rows and returns them with ids', () => {
  const store = new SqliteScoreStore(':memory:');

  try {
    const saved = store.record(entry('Ada', 97, 1_000));
    assert.deepEqual(saved, {
      id: 1,
      playerName: 'Ada',
      gameType: 'number_guess',
      score: 97,
      attempts: 3,
      createdAt: 1_000
    });
  } finally {
    store.close();
  }
});

test('SqliteScoreStore ranks by score, then earliest timestamp', () => {
  const store = new SqliteScoreStore(':memory:');

  try {
    store.record(entry('A', 50, 300));
    store.record(entry('B', 80, 200));
    store.record(entry('C', 50, 100));
    store.record(entry('D', 80, 400));
    store.record(entry('E', 999, 500, 'tic_tac_toe'));

    assert.deepEqual(
      store.topScores('number_guess', 10).map((record) => record.playerName),
      ['B', 'D', 'C', 'A']
    );
    assert.deepEqual(
      store.topScores('number_guess', 3).map((record) => record.score),
      [80, 80, 50]
    );
    assert.deepEqual(
      store.recentScores(2).map((record) => record.playerName),
      ['E', 'D']
    );
  } finally {
    store.close();
  }
});

test('SqliteScoreStore resetAll reports removed rows and is idempotent', () => {
  const store = new SqliteScoreStore(':memory:');

  try {
    store.record(entry('A', 10, 1));
    store.record(entry('B', 20, 2));
    store.record(entry('C', 30, 3, 'rock_paper_scissors'));

    assert.equal(store.resetAll(), 3);
    assert.equal(store.resetAll(), 0);
    assert.deepEqual(store.recentScores(10), []);
  } finally {
    store.close();
  }
});

test('SqliteScoreStore surfaces rejected writes as storage errors', () => {
  const store = new SqliteScoreStore(':memory:');

  try {
    assert.throws(() => store.record(entry('A', -5, 1)), StorageError);
    assert.deepEqual(store.recentScores(10), []);
  } finally {
    store.close();
  }
});

test('SqliteScoreStore keeps records across reopening the database file', () => {
  const directory = mkdtempSync(join(tmpdir(), 'arcade-scores-'));
  const path = join(directory, 'scores.db');

  try {
    const writer = new SqliteScoreStore(path);
    writer.record(entry('Ada', 88, 10, 'tic_tac_toe'));
    writer.close();

    const reader = new SqliteScoreStore(path);
    try {
      assert.deepEqual(
        reader.topScores('tic_tac_toe', 5).map((record) => [record.playerName, record.score]),
        [['Ada', 88]]
      );
    } finally {
      reader.close();
    }
  } finally {
    rmSync(directory, { recursive: true, force: true });
  }
});
