import { z } from 'zod';

export const GameTypeSchema = z.enum(['number_guess', 'tic_tac_toe', 'rock_paper_scissors']);

export const SessionHeaders = {
  sessionToken: 'x-session-token',
  adminToken: 'x-admin-token'
} as const;

export const GUESS_MIN = 1;
export const GUESS_MAX = 100;
export const BOARD_SIZE = 9;

export const PlayerNameSchema = z.string().trim().min(1).max(100);

export const GuessResultSchema = z.enum(['correct', 'too_high', 'too_low']);
export const BoardMarkSchema = z.enum(['X', 'O']);
export const BoardCellSchema = BoardMarkSchema.nullable();
export const TicTacToeWinnerSchema = z.enum(['X', 'O', 'draw']);
export const TurnSchema = z.enum(['player', 'computer']);
export const RpsChoiceSchema = z.enum(['rock', 'paper', 'scissors']);
export const RpsOutcomeSchema = z.enum(['win', 'lose', 'tie']);

// Range checks on guess and position belong to the rule engine so that
// out-of-range values surface as invalid input or invalid moves.
export const NumberGuessMoveSchema = z.object({
  playerName: PlayerNameSchema.optional(),
  guess: z.number().int()
});

export const TicTacToeMoveSchema = z.object({
  playerName: PlayerNameSchema.optional(),
  position: z.number().int()
});

export const RockPaperScissorsMoveSchema = z.object({
  playerName: PlayerNameSchema.optional(),
  choice: RpsChoiceSchema
});

export const NumberGuessSummarySchema = z.object({
  gameType: z.literal('number_guess'),
  attempts: z.number().int().nonnegative(),
  finished: z.boolean(),
  lastResult: GuessResultSchema.nullable(),
  range: z.object({
    min: z.literal(GUESS_MIN),
    max: z.literal(GUESS_MAX)
  }),
  createdAt: z.number(),
  updatedAt: z.number()
});

export const TicTacToeSummarySchema = z.object({
  gameType: z.literal('tic_tac_toe'),
  board: z.array(BoardCellSchema).length(BOARD_SIZE),
  turn: TurnSchema,
  finished: z.boolean(),
  winner: TicTacToeWinnerSchema.nullable(),
  computerMove: z.number().int().min(0).max(BOARD_SIZE - 1).nullable(),
  createdAt: z.number(),
  updatedAt: z.number()
});

export const RpsRoundSchema = z.object({
  playerChoice: RpsChoiceSchema,
  computerChoice: RpsChoiceSchema,
  outcome: RpsOutcomeSchema
});

export const RockPaperScissorsSummarySchema = z.object({
  gameType: z.literal('rock_paper_scissors'),
  wins: z.number().int().nonnegative(),
  losses: z.number().int().nonnegative(),
  ties: z.number().int().nonnegative(),
  gamesPlayed: z.number().int().nonnegative(),
  winRate: z.number().min(0).max(100),
  lastRound: RpsRoundSchema.nullable(),
  createdAt: z.number(),
  updatedAt: z.number()
});

export const GameStateSummarySchema = z.discriminatedUnion('gameType', [
  NumberGuessSummarySchema,
  TicTacToeSummarySchema,
  RockPaperScissorsSummarySchema
]);

export const MoveOutcomeSchema = z.enum(['correct', 'win', 'lose', 'draw', 'tie']);

export const ScoreRecordSchema = z.object({
  id: z.number().int().positive(),
  playerName: PlayerNameSchema,
  gameType: GameTypeSchema,
  score: z.number().int().nonnegative(),
  attempts: z.number().int().nonnegative(),
  createdAt: z.number()
});

export const MoveResponseSchema = z.object({
  state: GameStateSummarySchema,
  outcome: MoveOutcomeSchema.nullable(),
  score: z.number().int().nonnegative().nullable(),
  record: ScoreRecordSchema.nullable(),
  message: z.string()
});

export const GameStateResponseSchema = z.object({
  state: GameStateSummarySchema.nullable()
});

export const GameResetResponseSchema = z.object({
  reset: z.boolean()
});

export const SessionResponseSchema = z.object({
  sessionToken: z.string().min(1)
});

export const ScoreQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).default(10)
});

export const ScoreListResponseSchema = z.object({
  scores: z.array(ScoreRecordSchema)
});

export const ScoreResetResponseSchema = z.object({
  removed: z.number().int().nonnegative()
});

export const GameErrorSchema = z.object({
  message: z.string(),
  result: MoveResponseSchema.optional()
});

export type GameType = z.infer<typeof GameTypeSchema>;
export type GuessResult = z.infer<typeof GuessResultSchema>;
export type BoardMark = z.infer<typeof BoardMarkSchema>;
export type BoardCell = z.infer<typeof BoardCellSchema>;
export type TicTacToeWinner = z.infer<typeof TicTacToeWinnerSchema>;
export type Turn = z.infer<typeof TurnSchema>;
export type RpsChoice = z.infer<typeof RpsChoiceSchema>;
export type RpsOutcome = z.infer<typeof RpsOutcomeSchema>;
export type RpsRound = z.infer<typeof RpsRoundSchema>;
export type NumberGuessMove = z.infer<typeof NumberGuessMoveSchema>;
export type TicTacToeMove = z.infer<typeof TicTacToeMoveSchema>;
export type RockPaperScissorsMove = z.infer<typeof RockPaperScissorsMoveSchema>;
export type NumberGuessSummary = z.infer<typeof NumberGuessSummarySchema>;
export type TicTacToeSummary = z.infer<typeof TicTacToeSummarySchema>;
export type RockPaperScissorsSummary = z.infer<typeof RockPaperScissorsSummarySchema>;
export type GameStateSummary = z.infer<typeof GameStateSummarySchema>;
export type MoveOutcome = z.infer<typeof MoveOutcomeSchema>;
export type ScoreRecordPayload = z.infer<typeof ScoreRecordSchema>;
export type MoveResponse = z.infer<typeof MoveResponseSchema>;
export type GameStateResponse = z.infer<typeof GameStateResponseSchema>;
export type GameResetResponse = z.infer<typeof GameResetResponseSchema>;
export type SessionResponse = z.infer<typeof SessionResponseSchema>;
export type ScoreQuery = z.infer<typeof ScoreQuerySchema>;
export type ScoreListResponse = z.infer<typeof ScoreListResponseSchema>;
export type ScoreResetResponse = z.infer<typeof ScoreResetResponseSchema>;
export type GameErrorPayload = z.infer<typeof GameErrorSchema>;
