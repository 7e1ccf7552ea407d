import { CASTLING_RIGHTS, CastlingRights, castlingRightsIndex } from './castling.js';
import { ByColor, ByRole, Color, COLORS, Piece, Square } from './types.js';
import { squareFile } from './util.js';

const MASK_64 = 0xffff_ffff_ffff_ffffn;

export const ZOBRIST_SEED = 1370359990842121n;

/**
 * Seeded xorshift64* generator.
 */
class Xorshift64Star {
  private state: bigint;

  constructor(seed: bigint) {
    this.state = seed & MASK_64;
  }

  next(): bigint {
    let x = this.state;
    x ^= x >> 12n;
    x = (x ^ (x << 25n)) & MASK_64;
    x ^= x >> 27n;
    this.state = x;
    return (x * 0x2545_f491_4f6c_dd1dn) & MASK_64;
  }
}

/**
 * Everything the position hash depends on.
 */
export interface ZobristFeatures extends Iterable<[Square, Piece]> {
  readonly turn: Color;
  readonly epSquare: Square | undefined;
  castlingRights(color: Color): CastlingRights;
}

/**
 * Random 64 bit values for every hashed feature of a position: one per
 * piece on a square, one per castling rights value of each side, one per
 * en passant file and one for black to move.
 *
 * The hash of a position is the XOR of the values of its features, so a
 * change of one feature XORs the old value out and the new one in.
 */
export class ZobristHasher {
  private readonly blackToMove: bigint;
  private readonly pieces: ByColor<ByRole<bigint[]>>;
  private readonly castling: ByColor<bigint[]>;
  private readonly ep: bigint[];

  constructor(seed: bigint = ZOBRIST_SEED) {
    const rng = new Xorshift64Star(seed);
    const draw = (n: number): bigint[] => Array.from({ length: n }, () => rng.next());
    const drawRoles = (): ByRole<bigint[]> => ({
      pawn: draw(64),
      knight: draw(64),
      bishop: draw(64),
      rook: draw(64),
      queen: draw(64),
      king: draw(64),
    });

    // Draw order fixes the values, keep it.
    this.blackToMove = rng.next();
    const white = drawRoles();
    const black = drawRoles();
    this.pieces = { white, black };
    const whiteCastling = draw(CASTLING_RIGHTS.length);
    const blackCastling = draw(CASTLING_RIGHTS.length);
    this.castling = { white: whiteCastling, black: blackCastling };
    this.ep = draw(8);
  }

  pieceValue(piece: Piece, square: Square): bigint {
    return this.pieces[piece.color][piece.role][square];
  }

  blackToMoveValue(): bigint {
    return this.blackToMove;
  }

  castlingValue(color: Color, rights: CastlingRights): bigint {
    return this.castling[color][castlingRightsIndex(rights)];
  }

  /** Value of an en passant target, keyed by its file. */
  epValue(square: Square): bigint {
    return this.ep[squareFile(square)];
  }

  /**
   * Computes the hash of `pos` from scratch.
   */
  hashPosition(pos: ZobristFeatures): bigint {
    let hash = 0n;
    if (pos.turn === 'black') hash ^= this.blackToMove;
    for (const [square, piece] of pos) hash ^= this.pieceValue(piece, square);
    for (const color of COLORS) hash ^= this.castlingValue(color, pos.castlingRights(color));
    if (pos.epSquare !== undefined) hash ^= this.epValue(pos.epSquare);
    return hash;
  }
}

let sharedHasher: ZobristHasher | undefined;

/**
 * Gets the process wide hasher seeded with {@link ZOBRIST_SEED}, creating
 * it on first use.
 */
export const zobristHasher = (): ZobristHasher => {
  if (!sharedHasher) sharedHasher = new ZobristHasher();
  return sharedHasher;
};
