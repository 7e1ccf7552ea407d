import { Board } from './board.js';
import { CastlingRights } from './castling.js';
import { ByColor, BySquare, Color, Piece, Square } from './types.js';

/**
 * A not necessarily legal chess position, in the form a {@link Position}
 * is constructed from.
 */
export interface Setup {
  board: Board;
  turn: Color;
  castlingRights: ByColor<CastlingRights>;
  epSquare: Square | undefined;
  halfmoves: number;
  fullmoves: number;
}

const BACK_RANK: Piece['role'][] = ['rook', 'knight', 'bishop', 'queen', 'king', 'bishop', 'knight', 'rook'];

/**
 * Mutable staging area for a position: one entry per square plus the
 * state fields. Nothing is checked here, validation happens when a
 * position is constructed from it.
 */
export class BoardBuilder {
  pieces: BySquare<Piece | undefined>;
  turn: Color;
  castlingRights: ByColor<CastlingRights>;
  epSquare: Square | undefined;
  halfmoves: number;
  fullmoves: number;

  private constructor() {
    this.pieces = new Array<Piece | undefined>(64).fill(undefined);
    this.turn = 'white';
    this.castlingRights = { white: 'neither', black: 'neither' };
    this.epSquare = undefined;
    this.halfmoves = 0;
    this.fullmoves = 1;
  }

  /** Empty board, white to move, no castling rights. */
  static empty(): BoardBuilder {
    return new BoardBuilder();
  }

  /** The standard starting position. */
  static default(): BoardBuilder {
    const builder = new BoardBuilder();
    BACK_RANK.forEach((role, file) => {
      builder.set(file, { role, color: 'white' });
      builder.set(file + 8, { role: 'pawn', color: 'white' });
      builder.set(file + 48, { role: 'pawn', color: 'black' });
      builder.set(file + 56, { role, color: 'black' });
    });
    builder.castlingRights = { white: 'both', black: 'both' };
    return builder;
  }

  static fromPieces(pieces: Iterable<[Square, Piece]>, turn: Color = 'white'): BoardBuilder {
    const builder = new BoardBuilder();
    for (const [square, piece] of pieces) builder.set(square, piece);
    builder.turn = turn;
    return builder;
  }

  static fromSetup(setup: Setup): BoardBuilder {
    const builder = BoardBuilder.fromPieces(setup.board, setup.turn);
    builder.castlingRights = { ...setup.castlingRights };
    builder.epSquare = setup.epSquare;
    builder.halfmoves = setup.halfmoves;
    builder.fullmoves = setup.fullmoves;
    return builder;
  }

  get(square: Square): Piece | undefined {
    return this.pieces[square];
  }

  /** Puts `piece` on `square`, or clears it. Returns the replaced piece. */
  set(square: Square, piece: Piece | undefined): Piece | undefined {
    const old = this.pieces[square];
    this.pieces[square] = piece;
    return old;
  }

  toSetup(): Setup {
    const board = Board.empty();
    this.pieces.forEach((piece, square) => {
      if (piece) board.set(square, piece);
    });
    return {
      board,
      turn: this.turn,
      castlingRights: { ...this.castlingRights },
      epSquare: this.epSquare,
      halfmoves: this.halfmoves,
      fullmoves: this.fullmoves,
    };
  }
}
