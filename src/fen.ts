import { Result } from '@badrap/result';
import { CastlingRights, castlingRightsUnion, makeCastlingRights } from './castling.js';
import { BoardBuilder } from './setup.js';
import { ByColor, Color, Piece } from './types.js';
import { charToRole, defined, makeSquare, parseSquare, roleToChar, squareFromCoords } from './util.js';

export const INITIAL_BOARD_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR';
export const INITIAL_FEN = INITIAL_BOARD_FEN + ' w KQkq - 0 1';
export const EMPTY_BOARD_FEN = '8/8/8/8/8/8/8/8';

export enum InvalidFen {
  Fen = 'ERR_FEN',
  Board = 'ERR_BOARD',
  Turn = 'ERR_TURN',
  Castling = 'ERR_CASTLING',
  EpSquare = 'ERR_EP_SQUARE',
  Halfmoves = 'ERR_HALFMOVES',
  Fullmoves = 'ERR_FULLMOVES',
}

/**
 * Malformed position string. The message is the {@link InvalidFen} code,
 * `fen` the complete offending input.
 */
export class FenError extends Error {
  constructor(
    readonly code: InvalidFen,
    readonly fen: string,
  ) {
    super(code);
  }
}

const charToPiece = (ch: string): Piece | undefined => {
  const role = charToRole(ch);
  return role && { role, color: ch.toLowerCase() === ch ? 'black' : 'white' };
};

const parseBoardFen = (builder: BoardBuilder, boardPart: string): boolean => {
  const ranks = boardPart.split('/');
  if (ranks.length !== 8) return false;
  for (let i = 0; i < 8; i++) {
    const rank = 7 - i;
    let file = 0;
    for (const c of ranks[i]) {
      if (file >= 8) return false;
      const step = c.charCodeAt(0) - '0'.charCodeAt(0);
      if (1 <= step && step <= 8) {
        file += step;
        if (file > 8) return false;
      } else {
        const piece = charToPiece(c);
        const square = squareFromCoords(file, rank);
        if (!piece || !defined(square)) return false;
        builder.set(square, piece);
        file++;
      }
    }
    if (file !== 8) return false;
  }
  return true;
};

const parseCastlingFen = (castlingPart: string): ByColor<CastlingRights> | undefined => {
  const rights: ByColor<CastlingRights> = { white: 'neither', black: 'neither' };
  if (castlingPart === '-') return rights;
  // K, Q, k, q each at most once and in that order.
  if (!/^K?Q?k?q?$/.test(castlingPart) || castlingPart.length === 0) return;
  for (const c of castlingPart) {
    const color: Color = c === c.toUpperCase() ? 'white' : 'black';
    rights[color] = castlingRightsUnion(rights[color], c.toLowerCase() === 'k' ? 'kingside' : 'queenside');
  }
  return rights;
};

const parseCounter = (part: string): number | undefined => {
  if (!/^\d+$/.test(part)) return;
  const n = parseInt(part, 10);
  return Number.isSafeInteger(n) ? n : undefined;
};

/**
 * Parses a position string into an unchecked {@link BoardBuilder}. All six
 * fields are required.
 */
export const parseFen = (fen: string): Result<BoardBuilder, FenError> => {
  const err = (code: InvalidFen) => Result.err(new FenError(code, fen));
  const parts = fen.trim().split(/\s+/);
  if (parts.length !== 6) return err(InvalidFen.Fen);
  const [boardPart, turnPart, castlingPart, epPart, halfmovePart, fullmovePart] = parts;

  const builder = BoardBuilder.empty();
  if (!parseBoardFen(builder, boardPart)) return err(InvalidFen.Board);

  if (turnPart === 'w') builder.turn = 'white';
  else if (turnPart === 'b') builder.turn = 'black';
  else return err(InvalidFen.Turn);

  const castlingRights = parseCastlingFen(castlingPart);
  if (!castlingRights) return err(InvalidFen.Castling);
  builder.castlingRights = castlingRights;

  if (epPart !== '-') {
    const epSquare = parseSquare(epPart);
    if (!defined(epSquare)) return err(InvalidFen.EpSquare);
    builder.epSquare = epSquare;
  }

  const halfmoves = parseCounter(halfmovePart);
  if (!defined(halfmoves)) return err(InvalidFen.Halfmoves);
  builder.halfmoves = halfmoves;

  const fullmoves = parseCounter(fullmovePart);
  if (!defined(fullmoves)) return err(InvalidFen.Fullmoves);
  builder.fullmoves = fullmoves;

  return Result.ok(builder);
};

export const makePiece = (piece: Piece): string => {
  const r = roleToChar(piece.role);
  return piece.color === 'white' ? r.toUpperCase() : r;
};

export const makeBoardFen = (builder: BoardBuilder): string => {
  let fen = '';
  let empty = 0;
  for (let rank = 7; rank >= 0; rank--) {
    for (let file = 0; file < 8; file++) {
      const piece = builder.get(file + 8 * rank);
      if (!piece) empty++;
      else {
        if (empty > 0) {
          fen += empty;
          empty = 0;
        }
        fen += makePiece(piece);
      }

      if (file === 7) {
        if (empty > 0) {
          fen += empty;
          empty = 0;
        }
        if (rank !== 0) fen += '/';
      }
    }
  }
  return fen;
};

export const makeCastlingFen = (rights: ByColor<CastlingRights>): string =>
  makeCastlingRights(rights.white).toUpperCase() + makeCastlingRights(rights.black) || '-';

export const makeFen = (builder: BoardBuilder): string =>
  [
    makeBoardFen(builder),
    builder.turn[0],
    makeCastlingFen(builder.castlingRights),
    defined(builder.epSquare) ? makeSquare(builder.epSquare) : '-',
    builder.halfmoves,
    builder.fullmoves,
  ].join(' ');
