import type {
  BoardCell,
  BoardMark,
  GameType,
  GuessResult,
  RpsChoice,
  RpsOutcome,
  RpsRound,
  TicTacToeWinner,
  Turn
} from '@arcade/shared';

export type {
  BoardCell,
  BoardMark,
  GameType,
  GuessResult,
  RpsChoice,
  RpsOutcome,
  RpsRound,
  TicTacToeWinner,
  Turn
};

export type Board = readonly BoardCell[];

export const PLAYER_MARK: BoardMark = 'X';
export const COMPUTER_MARK: BoardMark = 'O';

interface StateTimestamps {
  createdAt: number;
  updatedAt: number;
}

export interface NumberGuessState extends StateTimestamps {
  gameType: 'number_guess';
  secret: number;
  attempts: number;
  finished: boolean;
  lastResult: GuessResult | null;
}

export interface TicTacToeState extends StateTimestamps {
  gameType: 'tic_tac_toe';
  board: Board;
  turn: Turn;
  finished: boolean;
  winner: TicTacToeWinner | null;
  computerMove: number | null;
}

export interface RockPaperScissorsState extends StateTimestamps {
  gameType: 'rock_paper_scissors';
  wins: number;
  losses: number;
  ties: number;
  gamesPlayed: number;
  lastRound: RpsRound | null;
}

export type GameState = NumberGuessState | TicTacToeState | RockPaperScissorsState;

export type GameStateOf<T extends GameType> = Extract<GameState, { gameType: T }>;

export type BoardStatus =
  | { kind: 'ongoing' }
  | { kind: 'win'; mark: BoardMark }
  | { kind: 'draw' };

export interface GuessEvaluation {
  result: GuessResult;
  attempts: number;
}

export interface BoardEvaluation {
  board: Board;
  status: BoardStatus;
}

export type GameMove =
  | { gameType: 'number_guess'; playerName: string; guess: number }
  | { gameType: 'tic_tac_toe'; playerName: string; position: number }
  | { gameType: 'rock_paper_scissors'; playerName: string; choice: RpsChoice };

export type TerminalOutcome =
  | { gameType: 'number_guess'; result: 'correct'; attempts: number }
  | { gameType: 'tic_tac_toe'; status: 'win' | 'lose' | 'draw' }
  | { gameType: 'rock_paper_scissors'; outcome: RpsOutcome; gamesPlayed: number };

export interface MoveResult<S extends GameState = GameState> {
  state: S;
  outcome: TerminalOutcome | null;
}

export interface ScoreRecord {
  id: number;
  playerName: string;
  gameType: GameType;
  score: number;
  attempts: number;
  createdAt: number;
}

export type NewScoreRecord = Omit<ScoreRecord, 'id'>;
