export {
  applyBoardMove,
  applyGuess,
  applyMove,
  applyRPSRound,
  createGameState,
  createNumberGuess,
  createRockPaperScissors,
  createTicTacToe,
  isFinished
} from './engine.js';
export {
  WINNING_LINES,
  drawComputerChoice,
  emptyBoard,
  evaluateBoardMove,
  evaluateGuess,
  evaluateRPS,
  findWinner,
  pickComputerMove
} from './rules.js';
export {
  attemptsForOutcome,
  scoreNumberGuess,
  scoreOutcome,
  scoreRPSRound,
  scoreTicTacToe,
  winRate
} from './scorer.js';
export { InMemoryGameStateRepository } from './memoryRepository.js';
export type { GameStateRepository } from './repository.js';
export { mathRandomSource } from './random.js';
export type { RandomSource } from './random.js';
export {
  assertAdminToken,
  getGameState,
  listRecentScores,
  listTopScores,
  parseGameType,
  parseMove,
  resetGame,
  resetScores,
  submitMove,
  sweepIdleSessions
} from './service.js';
export type { GameServiceDeps } from './service.js';
export { toScorePayload, toStateSummary } from './serializers.js';
export type {
  Board,
  BoardStatus,
  GameMove,
  GameState,
  GameType,
  MoveResult,
  NewScoreRecord,
  NumberGuessState,
  RockPaperScissorsState,
  ScoreRecord,
  TerminalOutcome,
  TicTacToeState
} from './types.js';
