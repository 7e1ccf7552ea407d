import { Result } from '@badrap/result';
import { isCastling, Move, PROMOTION_ROLES, PromotionRole, Role } from './types.js';
import { charToRole, makeSquare, roleToChar, squareFromString } from './util.js';

export enum InvalidMove {
  Length = 'ERR_MOVE_LENGTH',
  Square = 'ERR_MOVE_SQUARE',
  Role = 'ERR_MOVE_ROLE',
  Promotion = 'ERR_PROMOTION',
}

export class MoveParseError extends Error {
  constructor(
    readonly code: InvalidMove,
    readonly text: string,
  ) {
    super(code);
  }
}

const isPromotionRole = (role: Role): role is PromotionRole => PROMOTION_ROLES.some(r => r === role);

/**
 * Parses move text like `e2e4`, `Ng1f3`, `e7e8=Q`, `O-O` or `O-O-O`.
 *
 * Without a leading piece letter the move is a pawn move. Piece letters are
 * accepted in either case. Whether the move is legal, or even describes a
 * piece actually on the board, is not checked here.
 */
export const parseMove = (text: string): Result<Move, MoveParseError> => {
  const err = (code: InvalidMove) => Result.err(new MoveParseError(code, text));
  if (text === 'O-O') return Result.ok({ castle: 'kingside' });
  if (text === 'O-O-O') return Result.ok({ castle: 'queenside' });

  let body = text;
  let promotion: PromotionRole | undefined;
  const eq = text.indexOf('=');
  if (eq >= 0) {
    const suffix = text.slice(eq + 1);
    const role = suffix.length === 1 ? charToRole(suffix) : undefined;
    if (!role || !isPromotionRole(role)) return err(InvalidMove.Promotion);
    promotion = role;
    body = text.slice(0, eq);
  }

  let role: Role = 'pawn';
  if (body.length === 5) {
    const letter = charToRole(body[0]);
    if (!letter) return err(InvalidMove.Role);
    role = letter;
    body = body.slice(1);
  } else if (body.length !== 4) return err(InvalidMove.Length);

  const from = squareFromString(body.slice(0, 2));
  const to = squareFromString(body.slice(2, 4));
  if (from.isErr || to.isErr) return err(InvalidMove.Square);
  if (promotion && role !== 'pawn') return err(InvalidMove.Promotion);

  return Result.ok(promotion ? { role, from: from.value, to: to.value, promotion } : { role, from: from.value, to: to.value });
};

/**
 * Writes a move the way {@link parseMove} reads it, like `Qd1h5` or
 * `e7e8=Q`.
 */
export const makeMove = (move: Move): string => {
  if (isCastling(move)) return move.castle === 'kingside' ? 'O-O' : 'O-O-O';
  const letter = move.role === 'pawn' ? '' : roleToChar(move.role).toUpperCase();
  const promotion = move.promotion ? '=' + roleToChar(move.promotion).toUpperCase() : '';
  return letter + makeSquare(move.from) + makeSquare(move.to) + promotion;
};
