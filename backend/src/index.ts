import { createServer } from 'node:http';
import { createApp } from './app.js';
import { loadConfig } from './config.js';
import { InMemoryGameStateRepository, mathRandomSource, sweepIdleSessions } from './game/index.js';
import { SqliteScoreStore } from './scores/sqliteScoreStore.js';

const SWEEP_INTERVAL_MS = 60_000;

const config = loadConfig();
const repository = new InMemoryGameStateRepository();
const scores = new SqliteScoreStore(config.scoreDbPath);

const app = createApp({ config, repository, scores, random: mathRandomSource });
const httpServer = createServer(app);

const sweepTimer = setInterval(() => {
  const dropped = sweepIdleSessions(repository, config.sessionTtlMs);
  if (dropped > 0) {
    console.log(`Discarded ${dropped} idle session(s)`);
  }
}, SWEEP_INTERVAL_MS);

const shutdown = () => {
  clearInterval(sweepTimer);
  httpServer.close(() => {
    scores.close();
    process.exit(0);
  });
};

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);

httpServer.listen(config.port, () => {
  console.log(`Arcade API listening on http://localhost:${config.port}`);
  console.log(`Scores stored in ${config.scoreDbPath}`);
});
