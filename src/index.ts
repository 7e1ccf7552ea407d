export {
  FILE_NAMES,
  RANK_NAMES,
  COLORS,
  ROLES,
  PROMOTION_ROLES,
  CASTLING_SIDES,
  isCastling,
  isPieceMove,
} from './types.js';
export type {
  FileName,
  RankName,
  Square,
  File,
  Rank,
  SquareName,
  BySquare,
  Color,
  ByColor,
  Role,
  ByRole,
  PromotionRole,
  RoleChar,
  CastlingSide,
  ByCastlingSide,
  Piece,
  PieceMove,
  CastlingMove,
  Move,
} from './types.js';

export {
  InvalidCoordinate,
  CoordinateError,
  defined,
  opposite,
  squareRank,
  squareFile,
  squareFromCoords,
  shiftSquare,
  isLightSquare,
  roleToChar,
  charToRole,
  parseSquare,
  makeSquare,
  parseFile,
  parseRank,
  squareFromString,
  squareFromIndex,
  kingCastlesTo,
  rookCastlesTo,
  rookCastlesFrom,
  kingHome,
  moveEquals,
} from './util.js';

export { SquareSet } from './squareSet.js';

export {
  CASTLING_RIGHTS,
  castlingRightsIndex,
  castlingRightsUnion,
  castlingRightsDiff,
  hasKingside,
  hasQueenside,
  hasCastlingSide,
} from './castling.js';
export type { CastlingRights } from './castling.js';

export {
  AttackTables,
  DIRECTIONS,
  attackTables,
  kingAttacks,
  knightAttacks,
  pawnAttacks,
  bishopAttacks,
  rookAttacks,
  queenAttacks,
  attacks,
  between,
  ray,
} from './attacks.js';
export type { Direction, ByDirection } from './attacks.js';

export { ZobristHasher, ZOBRIST_SEED, zobristHasher } from './zobrist.js';
export type { ZobristFeatures } from './zobrist.js';

export { createContext, defaultContext } from './context.js';
export type { EngineContext } from './context.js';

export { Board, boardEquals } from './board.js';

export { BoardBuilder } from './setup.js';
export type { Setup } from './setup.js';

export {
  INITIAL_BOARD_FEN,
  INITIAL_FEN,
  EMPTY_BOARD_FEN,
  InvalidFen,
  FenError,
  parseFen,
  makeFen,
  makeBoardFen,
  makePiece,
} from './fen.js';

export { InvalidMove, MoveParseError, parseMove, makeMove } from './notation.js';

export { IllegalSetup, PositionError, IllegalMoveError, Position } from './chess.js';
export type { PinsAndChecks, Ambiguity, PositionStatus } from './chess.js';

export { makeSan, makeSanLine } from './san.js';

export { Game, GameError, IllegalAction, REPETITION_LIMIT, FIFTY_MOVES_LIMIT } from './game.js';
export type { GameAction, GameStatus } from './game.js';

export { renderBoard } from './render.js';
export type { RenderOptions } from './render.js';

export { parseConfig, loadConfig, ConfigError, DEFAULT_CONFIG } from './config.js';
export type { Config, LogLevel, LogFormat } from './config.js';

export { createLogger, logger } from './logger.js';
