import { Result } from '@badrap/result';
import { IllegalMoveError, Position } from './chess.js';
import { isCastling, Move } from './types.js';
import { makeSquare, roleToChar } from './util.js';

const checkSuffix = (after: Position): string => (after.isCheckmate() ? '#' : after.isCheck() ? '+' : '');

/**
 * Writes `move` in standard algebraic notation relative to `pos`, like
 * `Nbd7`, `exd6`, `e8=Q+` or `O-O#`.
 */
export const makeSan = (pos: Position, move: Move): Result<string, IllegalMoveError> =>
  pos.moveAmbiguity(move).chain(ambiguity =>
    pos.play(move).map(after => {
      if (isCastling(move)) return (move.castle === 'kingside' ? 'O-O' : 'O-O-O') + checkSuffix(after);
      let san = move.role === 'pawn' ? '' : roleToChar(move.role).toUpperCase();
      if (ambiguity === 'file') san += makeSquare(move.from)[0];
      else if (ambiguity === 'square') san += makeSquare(move.from);
      if (pos.isCapture(move)) san += 'x';
      san += makeSquare(move.to);
      if (move.promotion) san += '=' + roleToChar(move.promotion).toUpperCase();
      return san + checkSuffix(after);
    }),
  );

/**
 * Numbers and writes the moves played from `start`, like
 * `1. e4 e5 2. Qh5 Nc6`. A list starting with black opens with `1... e5`,
 * numbered after the full-move number of `start`.
 */
export const makeSanLine = (start: Position, moves: readonly Move[]): Result<string, IllegalMoveError> => {
  let pos = start;
  const tokens: string[] = [];
  for (const move of moves) {
    if (pos.turn === 'white') tokens.push(`${pos.fullmoves}.`);
    else if (tokens.length === 0) tokens.push(`${pos.fullmoves}...`);
    const san = makeSan(pos, move);
    if (san.isErr) return Result.err(san.error);
    const after = pos.play(move);
    if (after.isErr) return Result.err(after.error);
    tokens.push(san.value);
    pos = after.value;
  }
  return Result.ok(tokens.join(' '));
};
