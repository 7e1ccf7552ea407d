export const FILE_NAMES = ['a', 'b', 'c', 'd', 'e', 'f', 'g', 'h'] as const;

export type FileName = (typeof FILE_NAMES)[number];

export const RANK_NAMES = ['1', '2', '3', '4', '5', '6', '7', '8'] as const;

export type RankName = (typeof RANK_NAMES)[number];

/**
 * Index of a square, `a1 = 0` through `h8 = 63`.
 */
export type Square = number;

/** Index of a file, `a = 0` through `h = 7`. */
export type File = number;

/** Index of a rank, `1 = 0` through `8 = 7`. */
export type Rank = number;

export type SquareName = `${FileName}${RankName}`;

/**
 * Indexable by square indices.
 */
export type BySquare<T> = T[];

export const COLORS = ['white', 'black'] as const;

export type Color = (typeof COLORS)[number];

/**
 * Indexable by `white` and `black`.
 */
export type ByColor<T> = {
  [color in Color]: T;
};

export const ROLES = ['pawn', 'knight', 'bishop', 'rook', 'queen', 'king'] as const;

export type Role = (typeof ROLES)[number];

/**
 * Indexable by `pawn`, `knight`, `bishop`, `rook`, `queen`, and `king`.
 */
export type ByRole<T> = {
  [role in Role]: T;
};

export const PROMOTION_ROLES = ['knight', 'bishop', 'rook', 'queen'] as const;

export type PromotionRole = (typeof PROMOTION_ROLES)[number];

export type RoleChar = 'p' | 'n' | 'b' | 'r' | 'q' | 'k';

export const CASTLING_SIDES = ['kingside', 'queenside'] as const;

export type CastlingSide = (typeof CASTLING_SIDES)[number];

export type ByCastlingSide<T> = {
  [side in CastlingSide]: T;
};

export interface Piece {
  role: Role;
  color: Color;
}

/**
 * Moves a piece from `from` to `to`, promoting a pawn that reaches the last
 * rank to `promotion`.
 */
export interface PieceMove {
  role: Role;
  from: Square;
  to: Square;
  promotion?: PromotionRole;
}

/**
 * Castles on the given side. King and rook squares follow from the side to
 * move.
 */
export interface CastlingMove {
  castle: CastlingSide;
}

export type Move = PieceMove | CastlingMove;

export const isCastling = (v: Move): v is CastlingMove => 'castle' in v;

export const isPieceMove = (v: Move): v is PieceMove => 'from' in v;
