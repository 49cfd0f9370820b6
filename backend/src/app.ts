import cors from 'cors';
import express, { type NextFunction, type Request, type Response } from 'express';
import morgan from 'morgan';
import {
  GameErrorSchema,
  GameResetResponseSchema,
  GameStateResponseSchema,
  ScoreListResponseSchema,
  ScoreQuerySchema,
  ScoreResetResponseSchema,
  SessionHeaders,
  SessionResponseSchema
} from '@arcade/shared';
import type { AppConfig } from './config.js';
import { StorageError, toArcadeError } from './errors.js';
import {
  assertAdminToken,
  getGameState,
  listRecentScores,
  listTopScores,
  parseGameType,
  parseMove,
  resetGame,
  resetScores,
  submitMove,
  type GameStateRepository,
  type RandomSource
} from './game/index.js';
import type { ScoreStore } from './scores/store.js';
import { issueSessionToken, verifySessionToken } from './session/tokens.js';

export interface AppDeps {
  config: Pick<AppConfig, 'corsOrigin' | 'sessionSecret' | 'adminToken' | 'production'>;
  repository: GameStateRepository;
  scores: ScoreStore;
  random: RandomSource;
}

export const createApp = ({ config, repository, scores, random }: AppDeps) => {
  const app = express();
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json());
  app.use(morgan(config.production ? 'combined' : 'dev'));

  const sessionIdFor = (req: Request) => verifySessionToken(req.header(SessionHeaders.sessionToken), config.sessionSecret);

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.post('/session', (_req, res) => {
    res.status(201).json(SessionResponseSchema.parse({ sessionToken: issueSessionToken(config.sessionSecret) }));
  });

  app.post('/games/:gameType/move', (req, res) => {
    const sessionId = sessionIdFor(req);
    const gameType = parseGameType(req.params.gameType);
    const move = parseMove(gameType, req.body);
    res.json(submitMove(sessionId, move, { repository, scores, random }));
  });

  app.get('/games/:gameType/state', (req, res) => {
    const sessionId = sessionIdFor(req);
    const gameType = parseGameType(req.params.gameType);
    res.json(GameStateResponseSchema.parse({ state: getGameState(sessionId, gameType, repository) }));
  });

  app.post('/games/:gameType/reset', (req, res) => {
    const sessionId = sessionIdFor(req);
    const gameType = parseGameType(req.params.gameType);
    res.json(GameResetResponseSchema.parse({ reset: resetGame(sessionId, gameType, repository) }));
  });

  app.get('/scores/recent', (req, res) => {
    const { limit } = ScoreQuerySchema.parse(req.query);
    res.json(ScoreListResponseSchema.parse({ scores: listRecentScores(limit, scores) }));
  });

  app.get('/scores/:gameType', (req, res) => {
    const gameType = parseGameType(req.params.gameType);
    const { limit } = ScoreQuerySchema.parse(req.query);
    res.json(ScoreListResponseSchema.parse({ scores: listTopScores(gameType, limit, scores) }));
  });

  app.post('/admin/scores/reset', (req, res) => {
    assertAdminToken(req.header(SessionHeaders.adminToken), config.adminToken);
    res.json(ScoreResetResponseSchema.parse({ removed: resetScores(scores) }));
  });

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const arcadeError = toArcadeError(error);
    if (arcadeError.status >= 500) {
      console.error(arcadeError.cause ?? arcadeError);
    }

    const message = arcadeError.status >= 500 && !(arcadeError instanceof StorageError)
      ? 'Internal server error'
      : arcadeError.message;
    const result = arcadeError instanceof StorageError ? arcadeError.result : undefined;

    res.status(arcadeError.status).json(GameErrorSchema.parse({ message, result }));
  });

  return app;
};
