import { CastlingSide } from './types.js';

/**
 * Castling rights of one side, in index order. The index doubles as a two
 * bit mask: bit 0 for kingside, bit 1 for queenside.
 */
export const CASTLING_RIGHTS = ['neither', 'kingside', 'queenside', 'both'] as const;

export type CastlingRights = (typeof CASTLING_RIGHTS)[number];

export const castlingRightsIndex = (rights: CastlingRights): number => CASTLING_RIGHTS.indexOf(rights);

const fromIndex = (index: number): CastlingRights => CASTLING_RIGHTS[index & 0b11];

export const castlingRightsUnion = (a: CastlingRights, b: CastlingRights): CastlingRights =>
  fromIndex(castlingRightsIndex(a) | castlingRightsIndex(b));

export const castlingRightsDiff = (a: CastlingRights, b: CastlingRights): CastlingRights =>
  fromIndex(castlingRightsIndex(a) & ~castlingRightsIndex(b));

export const hasKingside = (rights: CastlingRights): boolean => (castlingRightsIndex(rights) & 0b01) !== 0;

export const hasQueenside = (rights: CastlingRights): boolean => (castlingRightsIndex(rights) & 0b10) !== 0;

export const hasCastlingSide = (rights: CastlingRights, side: CastlingSide): boolean =>
  side === 'kingside' ? hasKingside(rights) : hasQueenside(rights);

/** Rights consisting of just `side`. */
export const castlingSideRights = (side: CastlingSide): CastlingRights =>
  side === 'kingside' ? 'kingside' : 'queenside';

/**
 * Position string letters for one side, `k`, `q`, `kq` or the empty string.
 */
export const makeCastlingRights = (rights: CastlingRights): string =>
  (hasKingside(rights) ? 'k' : '') + (hasQueenside(rights) ? 'q' : '');
