/**
 * Precomputed attack and ray tables.
 *
 * These are low-level lookups that can be used to implement chess rules.
 *
 * Implementation notes: every square gets eight ray masks scanned to the
 * board edge without regard to occupancy. Sliding pieces reach the union of
 * their rays, and blocking is applied at query time, either by cutting each
 * ray at its nearest occupant or by testing the squares strictly between
 * two squares (the between table) against occupancy. The tables are built
 * once and never mutated.
 *
 * @packageDocumentation
 */

import { SquareSet } from './squareSet.js';
import { BySquare, ByColor, Color, Piece, Square } from './types.js';
import { shiftSquare, squareFile, squareRank } from './util.js';

export const DIRECTIONS = ['north', 'south', 'east', 'west', 'northEast', 'northWest', 'southEast', 'southWest'] as const;

export type Direction = (typeof DIRECTIONS)[number];

export type ByDirection<T> = {
  [direction in Direction]: T;
};

/** File and rank step of each direction. */
const STEPS: ByDirection<[number, number]> = {
  north: [0, 1],
  south: [0, -1],
  east: [1, 0],
  west: [-1, 0],
  northEast: [1, 1],
  northWest: [-1, 1],
  southEast: [1, -1],
  southWest: [-1, -1],
};

// Rays whose squares grow in index away from the origin.
const ASCENDING: ByDirection<boolean> = {
  north: true,
  south: false,
  east: true,
  west: false,
  northEast: true,
  northWest: true,
  southEast: false,
  southWest: false,
};

const ORTHOGONAL: readonly Direction[] = ['north', 'south', 'east', 'west'];
const DIAGONAL: readonly Direction[] = ['northEast', 'northWest', 'southEast', 'southWest'];

const tabulate = <T>(f: (square: Square) => T): BySquare<T> => {
  const table = [];
  for (let square = 0; square < 64; square++) table[square] = f(square);
  return table;
};

const computeRange = (square: Square, deltas: [number, number][]): SquareSet => {
  let range = SquareSet.empty();
  for (const [df, dr] of deltas) {
    const to = shiftSquare(square, df, dr);
    if (to !== undefined) range = range.with(to);
  }
  return range;
};

const computeRay = (square: Square, [df, dr]: [number, number]): SquareSet => {
  let ray = SquareSet.empty();
  for (let to = shiftSquare(square, df, dr); to !== undefined; to = shiftSquare(to, df, dr)) {
    ray = ray.with(to);
  }
  return ray;
};

const sign = (n: number): number => (n > 0 ? 1 : n < 0 ? -1 : 0);

/**
 * `undefined` when `a` and `b` share no rank, file or diagonal, otherwise
 * the squares strictly between them.
 */
const computeBetween = (a: Square, b: Square): SquareSet | undefined => {
  const df = squareFile(b) - squareFile(a);
  const dr = squareRank(b) - squareRank(a);
  if (df !== 0 && dr !== 0 && Math.abs(df) !== Math.abs(dr)) return;
  let between = SquareSet.empty();
  for (let sq = shiftSquare(a, sign(df), sign(dr)); sq !== undefined && sq !== b; sq = shiftSquare(sq, sign(df), sign(dr))) {
    between = between.with(sq);
  }
  return between;
};

const unionOf = (sets: Iterable<SquareSet>): SquareSet => {
  let result = SquareSet.empty();
  for (const set of sets) result = result.union(set);
  return result;
};

export class AttackTables {
  readonly rays: ByDirection<BySquare<SquareSet>>;
  readonly knight: BySquare<SquareSet>;
  readonly king: BySquare<SquareSet>;
  /** Quiet pawn advances: one step, two from the initial rank. */
  readonly pawnPushes: ByColor<BySquare<SquareSet>>;
  readonly pawnCaptures: ByColor<BySquare<SquareSet>>;
  readonly bishop: BySquare<SquareSet>;
  readonly rook: BySquare<SquareSet>;
  readonly queen: BySquare<SquareSet>;
  private readonly betweenTable: (SquareSet | undefined)[];

  constructor() {
    this.rays = {
      north: tabulate(sq => computeRay(sq, STEPS.north)),
      south: tabulate(sq => computeRay(sq, STEPS.south)),
      east: tabulate(sq => computeRay(sq, STEPS.east)),
      west: tabulate(sq => computeRay(sq, STEPS.west)),
      northEast: tabulate(sq => computeRay(sq, STEPS.northEast)),
      northWest: tabulate(sq => computeRay(sq, STEPS.northWest)),
      southEast: tabulate(sq => computeRay(sq, STEPS.southEast)),
      southWest: tabulate(sq => computeRay(sq, STEPS.southWest)),
    };
    this.knight = tabulate(sq =>
      computeRange(sq, [
        [1, 2],
        [2, 1],
        [2, -1],
        [1, -2],
        [-1, -2],
        [-2, -1],
        [-2, 1],
        [-1, 2],
      ]),
    );
    this.king = tabulate(sq => computeRange(sq, DIRECTIONS.map(d => STEPS[d])));
    this.pawnPushes = {
      white: tabulate(sq => computeRange(sq, squareRank(sq) === 1 ? [[0, 1], [0, 2]] : [[0, 1]])),
      black: tabulate(sq => computeRange(sq, squareRank(sq) === 6 ? [[0, -1], [0, -2]] : [[0, -1]])),
    };
    this.pawnCaptures = {
      white: tabulate(sq => computeRange(sq, [[-1, 1], [1, 1]])),
      black: tabulate(sq => computeRange(sq, [[-1, -1], [1, -1]])),
    };
    this.bishop = tabulate(sq => unionOf(DIAGONAL.map(d => this.rays[d][sq])));
    this.rook = tabulate(sq => unionOf(ORTHOGONAL.map(d => this.rays[d][sq])));
    this.queen = tabulate(sq => this.bishop[sq].union(this.rook[sq]));
    this.betweenTable = [];
    for (let a = 0; a < 64; a++) {
      for (let b = 0; b < 64; b++) this.betweenTable[a * 64 + b] = computeBetween(a, b);
    }
  }

  /**
   * Gets the squares strictly between `a` and `b`: empty when they are
   * adjacent or identical, `undefined` when they share no rank, file or
   * diagonal.
   */
  between(a: Square, b: Square): SquareSet | undefined {
    return this.betweenTable[a * 64 + b];
  }

  /**
   * Gets the whole line through `a` and `b`, edge to edge and including
   * both, or an empty set if they are not aligned.
   */
  ray(a: Square, b: Square): SquareSet {
    if (a === b) return SquareSet.empty();
    for (const direction of DIRECTIONS) {
      if (this.rays[direction][a].has(b)) {
        return this.rays[direction][a].union(this.rays[reverse(direction)][a]).with(a);
      }
    }
    return SquareSet.empty();
  }

  /** Squares a pawn of `color` on `square` attacks. */
  pawnAttacks(color: Color, square: Square): SquareSet {
    return this.pawnCaptures[color][square];
  }

  bishopAttacks(square: Square, occupied: SquareSet): SquareSet {
    return this.slide(square, occupied, DIAGONAL);
  }

  rookAttacks(square: Square, occupied: SquareSet): SquareSet {
    return this.slide(square, occupied, ORTHOGONAL);
  }

  queenAttacks(square: Square, occupied: SquareSet): SquareSet {
    return this.slide(square, occupied, DIRECTIONS);
  }

  /**
   * Gets squares attacked or defended by a `piece` on `square`, given
   * `occupied` squares.
   */
  attacks(piece: Piece, square: Square, occupied: SquareSet): SquareSet {
    switch (piece.role) {
      case 'pawn':
        return this.pawnAttacks(piece.color, square);
      case 'knight':
        return this.knight[square];
      case 'bishop':
        return this.bishopAttacks(square, occupied);
      case 'rook':
        return this.rookAttacks(square, occupied);
      case 'queen':
        return this.queenAttacks(square, occupied);
      case 'king':
        return this.king[square];
    }
  }

  // Each ray is cut behind its nearest occupant, which stays attacked.
  private slide(square: Square, occupied: SquareSet, directions: readonly Direction[]): SquareSet {
    let result = SquareSet.empty();
    for (const direction of directions) {
      const ray = this.rays[direction][square];
      const blockers = ray.intersect(occupied);
      const nearest = ASCENDING[direction] ? blockers.first() : blockers.last();
      result = result.union(nearest === undefined ? ray : ray.diff(this.rays[direction][nearest]));
    }
    return result;
  }
}

const reverse = (direction: Direction): Direction => {
  switch (direction) {
    case 'north':
      return 'south';
    case 'south':
      return 'north';
    case 'east':
      return 'west';
    case 'west':
      return 'east';
    case 'northEast':
      return 'southWest';
    case 'northWest':
      return 'southEast';
    case 'southEast':
      return 'northWest';
    case 'southWest':
      return 'northEast';
  }
};

let sharedTables: AttackTables | undefined;

/**
 * Gets the process wide tables, building them on first use.
 */
export const attackTables = (): AttackTables => {
  if (!sharedTables) sharedTables = new AttackTables();
  return sharedTables;
};

/** King pattern of `square` from the shared tables. */
export const kingAttacks = (square: Square): SquareSet => attackTables().king[square];

/** Knight pattern of `square` from the shared tables. */
export const knightAttacks = (square: Square): SquareSet => attackTables().knight[square];

/** Capture squares of a `color` pawn on `square`, from the shared tables. */
export const pawnAttacks = (color: Color, square: Square): SquareSet => attackTables().pawnAttacks(color, square);

/**
 * Diagonal rays of `square` cut at their first occupant in `occupied`,
 * using the shared tables built on first call.
 */
export const bishopAttacks = (square: Square, occupied: SquareSet): SquareSet =>
  attackTables().bishopAttacks(square, occupied);

/** Like {@link bishopAttacks} along ranks and files. */
export const rookAttacks = (square: Square, occupied: SquareSet): SquareSet =>
  attackTables().rookAttacks(square, occupied);

/** Union of {@link bishopAttacks} and {@link rookAttacks}. */
export const queenAttacks = (square: Square, occupied: SquareSet): SquareSet =>
  attackTables().queenAttacks(square, occupied);

export const attacks = (piece: Piece, square: Square, occupied: SquareSet): SquareSet =>
  attackTables().attacks(piece, square, occupied);

export const between = (a: Square, b: Square): SquareSet | undefined => attackTables().between(a, b);

export const ray = (a: Square, b: Square): SquareSet => attackTables().ray(a, b);
