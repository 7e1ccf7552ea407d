import { Result } from '@badrap/result';
import {
  CastlingSide,
  Color,
  File,
  FILE_NAMES,
  isCastling,
  Move,
  Rank,
  RANK_NAMES,
  Role,
  RoleChar,
  Square,
  SquareName,
} from './types.js';

export enum InvalidCoordinate {
  File = 'ERR_FILE',
  Rank = 'ERR_RANK',
  Square = 'ERR_SQUARE',
  Index = 'ERR_SQUARE_INDEX',
}

export class CoordinateError extends Error {}

export const defined = <A>(v: A | undefined): v is A => v !== undefined;

export const opposite = (color: Color): Color => (color === 'white' ? 'black' : 'white');

export const squareRank = (square: Square): Rank => square >> 3;

export const squareFile = (square: Square): File => square & 0x7;

export const squareFromCoords = (file: number, rank: number): Square | undefined =>
  0 <= file && file < 8 && 0 <= rank && rank < 8 ? file + 8 * rank : undefined;

/**
 * Gets the square `fileDelta` files and `rankDelta` ranks away from `square`,
 * or `undefined` if that leaves the board.
 */
export const shiftSquare = (square: Square, fileDelta: number, rankDelta: number): Square | undefined =>
  squareFromCoords(squareFile(square) + fileDelta, squareRank(square) + rankDelta);

/**
 * Light squares are those where file and rank sum to an odd number, so `h1`
 * is light and `a1` is dark.
 */
export const isLightSquare = (square: Square): boolean => ((squareFile(square) + squareRank(square)) & 1) === 1;

export const roleToChar = (role: Role): RoleChar => {
  switch (role) {
    case 'pawn':
      return 'p';
    case 'knight':
      return 'n';
    case 'bishop':
      return 'b';
    case 'rook':
      return 'r';
    case 'queen':
      return 'q';
    case 'king':
      return 'k';
  }
};

export function charToRole(ch: RoleChar | Uppercase<RoleChar>): Role;
export function charToRole(ch: string): Role | undefined;
export function charToRole(ch: string): Role | undefined {
  switch (ch.toLowerCase()) {
    case 'p':
      return 'pawn';
    case 'n':
      return 'knight';
    case 'b':
      return 'bishop';
    case 'r':
      return 'rook';
    case 'q':
      return 'queen';
    case 'k':
      return 'king';
    default:
      return;
  }
}

export function parseSquare(str: SquareName): Square;
export function parseSquare(str: string): Square | undefined;
export function parseSquare(str: string): Square | undefined {
  if (str.length !== 2) return;
  return squareFromCoords(str.charCodeAt(0) - 'a'.charCodeAt(0), str.charCodeAt(1) - '1'.charCodeAt(0));
}

export const makeSquare = (square: Square): SquareName =>
  `${FILE_NAMES[squareFile(square)]}${RANK_NAMES[squareRank(square)]}`;

export const parseFile = (str: string): Result<File, CoordinateError> => {
  const file = FILE_NAMES.findIndex(name => name === str);
  return file >= 0 ? Result.ok(file) : Result.err(new CoordinateError(InvalidCoordinate.File));
};

export const parseRank = (str: string): Result<Rank, CoordinateError> => {
  const rank = RANK_NAMES.findIndex(name => name === str);
  return rank >= 0 ? Result.ok(rank) : Result.err(new CoordinateError(InvalidCoordinate.Rank));
};

/**
 * Parses a square name like `e4`, reporting whether the file or the rank
 * was at fault.
 */
export const squareFromString = (str: string): Result<Square, CoordinateError> => {
  if (str.length !== 2) return Result.err(new CoordinateError(InvalidCoordinate.Square));
  return parseFile(str[0]).chain(file => parseRank(str[1]).map(rank => file + 8 * rank));
};

export const squareFromIndex = (index: number): Result<Square, CoordinateError> =>
  Number.isInteger(index) && 0 <= index && index < 64
    ? Result.ok(index)
    : Result.err(new CoordinateError(InvalidCoordinate.Index));

export const kingCastlesTo = (color: Color, side: CastlingSide): Square =>
  color === 'white' ? (side === 'queenside' ? 2 : 6) : side === 'queenside' ? 58 : 62;

export const rookCastlesTo = (color: Color, side: CastlingSide): Square =>
  color === 'white' ? (side === 'queenside' ? 3 : 5) : side === 'queenside' ? 59 : 61;

/** Home corner of the rook that castles on `side`. */
export const rookCastlesFrom = (color: Color, side: CastlingSide): Square =>
  color === 'white' ? (side === 'queenside' ? 0 : 7) : side === 'queenside' ? 56 : 63;

export const kingHome = (color: Color): Square => (color === 'white' ? 4 : 60);

export const moveEquals = (left: Move, right: Move): boolean => {
  if (isCastling(left)) return isCastling(right) && left.castle === right.castle;
  return (
    !isCastling(right)
    && left.role === right.role
    && left.from === right.from
    && left.to === right.to
    && left.promotion === right.promotion
  );
};
