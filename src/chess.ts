import { Result } from '@badrap/result';
import { AttackTables } from './attacks.js';
import { Board } from './board.js';
import { CastlingRights, castlingRightsDiff, castlingSideRights, hasCastlingSide } from './castling.js';
import { defaultContext, EngineContext } from './context.js';
import { FenError, makeFen, parseFen } from './fen.js';
import { makeMove } from './notation.js';
import { BoardBuilder, Setup } from './setup.js';
import { SquareSet } from './squareSet.js';
import {
  ByColor,
  CASTLING_SIDES,
  CastlingSide,
  Color,
  COLORS,
  isCastling,
  Move,
  Piece,
  PieceMove,
  PROMOTION_ROLES,
  Role,
  ROLES,
  Square,
} from './types.js';
import {
  defined,
  kingCastlesTo,
  kingHome,
  opposite,
  rookCastlesFrom,
  rookCastlesTo,
  squareFile,
  squareRank,
} from './util.js';
import { ZobristFeatures } from './zobrist.js';

export enum IllegalSetup {
  ColorsOverlap = 'ERR_COLORS_OVERLAP',
  RolesOverlap = 'ERR_ROLES_OVERLAP',
  Occupancy = 'ERR_OCCUPANCY',
  Kings = 'ERR_KINGS',
  OppositeCheck = 'ERR_OPPOSITE_CHECK',
  EnPassant = 'ERR_EN_PASSANT',
  CastlingRights = 'ERR_CASTLING_RIGHTS',
}

export class PositionError extends Error {}

export class IllegalMoveError extends Error {
  constructor(readonly move: Move) {
    super(`ERR_ILLEGAL_MOVE ${makeMove(move)}`);
  }
}

export interface PinsAndChecks {
  /** Defending pieces that are the only occupant between an enemy slider and the square. */
  pinned: SquareSet;
  /** Attackers of the square. */
  checkers: SquareSet;
}

/** How much of the source square a written move needs to be unambiguous. */
export type Ambiguity = 'neither' | 'file' | 'square';

export type PositionStatus = { kind: 'ongoing' } | { kind: 'checkmate'; loser: Color } | { kind: 'stalemate' };

/**
 * Pins against and checks on `square` by pieces of `attacker`, given
 * `occupied` squares.
 *
 * Enemy sliders that would reach the square on an empty board are
 * inspected one by one: nothing between them and the square makes them a
 * checker, exactly one defending piece between them pins it. Knights,
 * pawns and the king cannot be blocked and go straight to the checkers.
 */
const computePinsAndChecks = (
  tables: AttackTables,
  board: Board,
  square: Square,
  attacker: Color,
  occupied: SquareSet,
): PinsAndChecks => {
  const enemies = board[attacker].intersect(occupied);
  const defenders = board[opposite(attacker)];
  const snipers = enemies.intersect(
    tables.bishop[square]
      .intersect(board.bishopsAndQueens())
      .union(tables.rook[square].intersect(board.rooksAndQueens())),
  );

  let pinned = SquareSet.empty();
  let checkers = SquareSet.empty();
  for (const sniper of snipers) {
    const between = tables.between(square, sniper);
    if (!between) continue;
    const blockers = between.intersect(occupied);
    if (blockers.isEmpty()) checkers = checkers.with(sniper);
    else if (!blockers.moreThanOne()) pinned = pinned.union(blockers.intersect(defenders));
  }

  checkers = checkers.union(
    enemies.intersect(
      tables.knight[square]
        .intersect(board.knight)
        .union(tables.pawnAttacks(opposite(attacker), square).intersect(board.pawn))
        .union(tables.king[square].intersect(board.king)),
    ),
  );
  return { pinned, checkers };
};

const isLastRank = (color: Color, square: Square): boolean => squareRank(square) === (color === 'white' ? 7 : 0);

/** Square of the pawn taken by an en passant capture onto `epSquare`. */
const epVictim = (color: Color, epSquare: Square): Square => epSquare + (color === 'white' ? -8 : 8);

/**
 * A validated chess position.
 *
 * Instances never change once returned: {@link Position.play} works on a
 * private copy, keeping the hash current by XOR-ing every changed feature
 * in and out as it goes.
 */
export class Position implements ZobristFeatures, Iterable<[Square, Piece]> {
  private board: Board;
  private _turn: Color;
  private rights: ByColor<CastlingRights>;
  private _epSquare: Square | undefined;
  private _halfmoves: number;
  private _fullmoves: number;
  private _pinned: SquareSet;
  private _checkers: SquareSet;
  private _hash: bigint;
  private terminal: boolean | undefined;

  private constructor(
    readonly ctx: EngineContext,
    setup: Setup,
  ) {
    this.board = setup.board.clone();
    this._turn = setup.turn;
    this.rights = { ...setup.castlingRights };
    this._epSquare = setup.epSquare;
    this._halfmoves = setup.halfmoves;
    this._fullmoves = setup.fullmoves;
    this._pinned = SquareSet.empty();
    this._checkers = SquareSet.empty();
    this._hash = 0n;
    this.terminal = undefined;
  }

  /** The standard starting position. */
  static default(ctx: EngineContext = defaultContext()): Position {
    const pos = new Position(ctx, BoardBuilder.default().toSetup());
    pos.refresh();
    pos._hash = ctx.zobrist.hashPosition(pos);
    return pos;
  }

  /**
   * Validates `setup` and constructs a position from it. Every violated
   * rule has its own {@link IllegalSetup} code.
   */
  static fromSetup(setup: Setup, ctx: EngineContext = defaultContext()): Result<Position, PositionError> {
    const err = (code: IllegalSetup) => Result.err(new PositionError(code));
    const board = setup.board;

    if (board.white.intersects(board.black)) return err(IllegalSetup.ColorsOverlap);
    let roles = SquareSet.empty();
    for (const role of ROLES) {
      if (roles.intersects(board[role])) return err(IllegalSetup.RolesOverlap);
      roles = roles.union(board[role]);
    }
    if (!roles.equals(board.occupied) || !board.white.union(board.black).equals(board.occupied)) {
      return err(IllegalSetup.Occupancy);
    }
    if (COLORS.some(color => board.pieces(color, 'king').size() !== 1)) return err(IllegalSetup.Kings);

    const pos = new Position(ctx, setup);
    const otherKing = pos.kingOf(opposite(pos.turn));
    if (pos.pinsAndChecks(otherKing, pos.turn).checkers.nonEmpty()) return err(IllegalSetup.OppositeCheck);

    if (defined(pos.epSquare) && !pos.isValidEpSquare(pos.epSquare)) return err(IllegalSetup.EnPassant);

    for (const color of COLORS) {
      for (const side of CASTLING_SIDES) {
        if (!hasCastlingSide(pos.rights[color], side)) continue;
        if (
          !board.pieces(color, 'king').has(kingHome(color))
          || !board.pieces(color, 'rook').has(rookCastlesFrom(color, side))
        ) {
          return err(IllegalSetup.CastlingRights);
        }
      }
    }

    pos.refresh();
    pos._hash = ctx.zobrist.hashPosition(pos);
    return Result.ok(pos);
  }

  static fromBuilder(builder: BoardBuilder, ctx?: EngineContext): Result<Position, PositionError> {
    return Position.fromSetup(builder.toSetup(), ctx);
  }

  static fromFen(fen: string, ctx?: EngineContext): Result<Position, FenError | PositionError> {
    const parsed: Result<BoardBuilder, FenError | PositionError> = parseFen(fen);
    return parsed.chain(builder => Position.fromBuilder(builder, ctx));
  }

  private clone(): Position {
    const pos = new Position(this.ctx, this.toSetup());
    pos._pinned = this._pinned;
    pos._checkers = this._checkers;
    pos._hash = this._hash;
    return pos;
  }

  // An en passant target lies on the sixth rank from the mover's side, is
  // empty along with the square the pawn came from, and has an enemy pawn
  // behind it.
  private isValidEpSquare(square: Square): boolean {
    if (squareRank(square) !== (this.turn === 'white' ? 5 : 2)) return false;
    const forward = this.turn === 'white' ? 8 : -8;
    if (this.board.occupied.has(square) || this.board.occupied.has(square + forward)) return false;
    return this.board.pieces(opposite(this.turn), 'pawn').has(square - forward);
  }

  private refresh(): void {
    const { pinned, checkers } = this.pinsAndChecks(this.kingOf(this.turn));
    this._pinned = pinned;
    this._checkers = checkers;
    this.terminal = undefined;
  }

  get turn(): Color {
    return this._turn;
  }

  get epSquare(): Square | undefined {
    return this._epSquare;
  }

  /** Half-moves since the last capture or pawn move. */
  get halfmoves(): number {
    return this._halfmoves;
  }

  get fullmoves(): number {
    return this._fullmoves;
  }

  get hash(): bigint {
    return this._hash;
  }

  /** Pieces of the side to move pinned to their king. */
  get pinned(): SquareSet {
    return this._pinned;
  }

  /** Enemy pieces giving check to the side to move. */
  get checkers(): SquareSet {
    return this._checkers;
  }

  get occupied(): SquareSet {
    return this.board.occupied;
  }

  get(square: Square): Piece | undefined {
    return this.board.get(square);
  }

  pieces(color: Color, role: Role): SquareSet {
    return this.board.pieces(color, role);
  }

  colorSet(color: Color): SquareSet {
    return this.board[color];
  }

  roleSet(role: Role): SquareSet {
    return this.board[role];
  }

  kingOf(color: Color): Square {
    const king = this.board.kingOf(color);
    if (!defined(king)) throw new Error(`position without ${color} king`);
    return king;
  }

  castlingRights(color: Color): CastlingRights {
    return this.rights[color];
  }

  [Symbol.iterator](): Iterator<[Square, Piece]> {
    return this.board[Symbol.iterator]();
  }

  /**
   * Pins against and checks on `square` by `attacker`, by default the side
   * not to move.
   */
  pinsAndChecks(square: Square, attacker: Color = opposite(this.turn), occupied?: SquareSet): PinsAndChecks {
    return computePinsAndChecks(this.ctx.tables, this.board, square, attacker, occupied ?? this.board.occupied);
  }

  isCheck(): boolean {
    return this._checkers.nonEmpty();
  }

  isLegal(move: Move): boolean {
    if (isCastling(move)) return this.canCastle(move.castle);
    const piece = this.board.get(move.from);
    if (!piece || piece.color !== this.turn || piece.role !== move.role) return false;
    if (!this.reaches(piece, move.from, move.to)) return false;
    if (defined(move.promotion) !== (piece.role === 'pawn' && isLastRank(this.turn, move.to))) return false;
    return this.keepsKingSafe(move);
  }

  /**
   * Whether `piece` on `from` can go to `to` under current occupancy,
   * ignoring the safety of its own king.
   */
  private reaches(piece: Piece, from: Square, to: Square): boolean {
    const tables = this.ctx.tables;
    const occupied = this.board.occupied;
    if (this.board[this.turn].has(to)) return false;
    switch (piece.role) {
      case 'pawn':
        if (tables.pawnPushes[this.turn][from].has(to)) {
          return !occupied.has(to) && tables.between(from, to)?.isDisjoint(occupied) === true;
        }
        return (
          tables.pawnCaptures[this.turn][from].has(to)
          && (this.board[opposite(this.turn)].has(to) || to === this.epSquare)
        );
      case 'knight':
        return tables.knight[from].has(to);
      case 'king':
        return tables.king[from].has(to);
      case 'bishop':
      case 'rook':
      case 'queen':
        return tables[piece.role][from].has(to) && tables.between(from, to)?.isDisjoint(occupied) === true;
    }
  }

  private pseudoDests(piece: Piece, from: Square): SquareSet {
    const tables = this.ctx.tables;
    const occupied = this.board.occupied;
    if (piece.role !== 'pawn') return tables.attacks(piece, from, occupied).diff(this.board[this.turn]);

    let dests = SquareSet.empty();
    for (const to of tables.pawnPushes[this.turn][from]) {
      if (!occupied.has(to) && tables.between(from, to)?.isDisjoint(occupied)) dests = dests.with(to);
    }
    let targets = this.board[opposite(this.turn)];
    if (defined(this.epSquare)) targets = targets.with(this.epSquare);
    return dests.union(tables.pawnCaptures[this.turn][from].intersect(targets));
  }

  /**
   * Plays `move` on a scratch copy of the board and looks for checks on the
   * mover's king. Pieces that are neither the king nor pinned nor capturing
   * en passant cannot expose the king when it is not already in check.
   */
  private keepsKingSafe(move: PieceMove): boolean {
    if (
      this._checkers.isEmpty()
      && move.role !== 'king'
      && !this._pinned.has(move.from)
      && !(move.role === 'pawn' && move.to === this.epSquare)
    ) {
      return true;
    }
    const scratch = this.board.clone();
    const piece = scratch.take(move.from);
    if (!piece) return false;
    if (piece.role === 'pawn' && move.to === this.epSquare) scratch.take(epVictim(this.turn, move.to));
    scratch.set(move.to, piece);
    const king = scratch.kingOf(this.turn);
    if (!defined(king)) return false;
    return computePinsAndChecks(this.ctx.tables, scratch, king, opposite(this.turn), scratch.occupied).checkers.isEmpty();
  }

  /**
   * Castling needs the right, a king not in check, empty squares between
   * king and rook, and no attack on the squares the king passes or lands
   * on.
   */
  private canCastle(side: CastlingSide): boolean {
    if (!hasCastlingSide(this.rights[this.turn], side) || this.isCheck()) return false;
    const king = kingHome(this.turn);
    const rook = rookCastlesFrom(this.turn, side);
    if (!this.board.pieces(this.turn, 'king').has(king) || !this.board.pieces(this.turn, 'rook').has(rook)) {
      return false;
    }
    const path = this.ctx.tables.between(king, rook);
    if (!path || path.intersects(this.board.occupied)) return false;

    const kingTo = kingCastlesTo(this.turn, side);
    const transit = this.ctx.tables.between(king, kingTo)?.with(kingTo) ?? SquareSet.empty();
    const occupied = this.board.occupied.without(king);
    for (const square of transit) {
      if (this.pinsAndChecks(square, opposite(this.turn), occupied).checkers.nonEmpty()) return false;
    }
    return true;
  }

  /**
   * Yields every legal move, pawn moves to the last rank once per
   * promotion role, castling last.
   */
  *generateMoves(): Generator<Move> {
    for (const from of this.board[this.turn]) {
      const piece = this.board.get(from);
      if (!piece) continue;
      for (const to of this.pseudoDests(piece, from)) {
        const move: PieceMove = { role: piece.role, from, to };
        if (!this.keepsKingSafe(move)) continue;
        if (piece.role === 'pawn' && isLastRank(this.turn, to)) {
          for (const promotion of PROMOTION_ROLES) yield { ...move, promotion };
        } else yield move;
      }
    }
    for (const side of CASTLING_SIDES) {
      if (this.canCastle(side)) yield { castle: side };
    }
  }

  legalMoves(): Move[] {
    return [...this.generateMoves()];
  }

  /**
   * Checks the legality of `move` and returns the position after it.
   */
  play(move: Move): Result<Position, IllegalMoveError> {
    if (!this.isLegal(move)) return Result.err(new IllegalMoveError(move));
    const pos = this.clone();
    pos.playUnchecked(move);
    return Result.ok(pos);
  }

  private playUnchecked(move: Move): void {
    const turn = this.turn;
    const them = opposite(turn);
    const prevEp = this.epSquare;
    this.setEpSquare(undefined);
    this._halfmoves += 1;
    if (turn === 'black') this._fullmoves += 1;

    if (isCastling(move)) {
      const king = this.clearSquare(kingHome(turn));
      const rook = this.clearSquare(rookCastlesFrom(turn, move.castle));
      if (!king || !rook) throw new Error(`castling without king or rook: ${makeMove(move)}`);
      this.putPiece(kingCastlesTo(turn, move.castle), king);
      this.putPiece(rookCastlesTo(turn, move.castle), rook);
      this.setCastlingRights(turn, 'neither');
    } else {
      const piece = this.clearSquare(move.from);
      if (!piece) throw new Error(`no piece to move: ${makeMove(move)}`);
      let captured = this.clearSquare(move.to);
      if (piece.role === 'pawn') {
        this._halfmoves = 0;
        if (move.to === prevEp) captured = this.clearSquare(epVictim(turn, move.to));
        if (Math.abs(move.to - move.from) === 16) this.setEpSquare((move.from + move.to) >> 1);
      }
      this.putPiece(move.to, move.promotion ? { role: move.promotion, color: turn } : piece);

      if (captured) {
        this._halfmoves = 0;
        if (captured.role === 'rook') {
          for (const side of CASTLING_SIDES) {
            if (move.to === rookCastlesFrom(them, side)) {
              this.setCastlingRights(them, castlingRightsDiff(this.rights[them], castlingSideRights(side)));
            }
          }
        }
      }
      if (piece.role === 'king') this.setCastlingRights(turn, 'neither');
      else if (piece.role === 'rook') {
        for (const side of CASTLING_SIDES) {
          if (move.from === rookCastlesFrom(turn, side)) {
            this.setCastlingRights(turn, castlingRightsDiff(this.rights[turn], castlingSideRights(side)));
          }
        }
      }
    }

    this.setTurn(them);
    this.refresh();
  }

  private putPiece(square: Square, piece: Piece): void {
    const zobrist = this.ctx.zobrist;
    const old = this.board.set(square, piece);
    if (old) this._hash ^= zobrist.pieceValue(old, square);
    this._hash ^= zobrist.pieceValue(piece, square);
  }

  private clearSquare(square: Square): Piece | undefined {
    const piece = this.board.take(square);
    if (piece) this._hash ^= this.ctx.zobrist.pieceValue(piece, square);
    return piece;
  }

  private setTurn(turn: Color): void {
    if (turn !== this._turn) this._hash ^= this.ctx.zobrist.blackToMoveValue();
    this._turn = turn;
  }

  private setCastlingRights(color: Color, rights: CastlingRights): void {
    const zobrist = this.ctx.zobrist;
    this._hash ^= zobrist.castlingValue(color, this.rights[color]) ^ zobrist.castlingValue(color, rights);
    this.rights[color] = rights;
  }

  private setEpSquare(square: Square | undefined): void {
    const zobrist = this.ctx.zobrist;
    if (defined(this._epSquare)) this._hash ^= zobrist.epValue(this._epSquare);
    if (defined(square)) this._hash ^= zobrist.epValue(square);
    this._epSquare = square;
  }

  /**
   * Whether the side to move has no legal move. Stops at the first legal
   * move found and remembers the answer.
   */
  isTerminal(): boolean {
    if (!defined(this.terminal)) this.terminal = this.generateMoves().next().done === true;
    return this.terminal;
  }

  isCheckmate(): boolean {
    return this.isCheck() && this.isTerminal();
  }

  isStalemate(): boolean {
    return !this.isCheck() && this.isTerminal();
  }

  status(): PositionStatus {
    if (!this.isTerminal()) return { kind: 'ongoing' };
    return this.isCheck() ? { kind: 'checkmate', loser: this.turn } : { kind: 'stalemate' };
  }

  /**
   * Narrow theoretical draw test: each side has at most one piece besides
   * its king, and that piece is a knight or a bishop.
   */
  isInsufficientMaterial(): boolean {
    const minors = this.board.knight.union(this.board.bishop);
    return COLORS.every(color => {
      const side = this.board[color];
      return side.size() <= 2 && side.diff(this.board.king).diff(minors).isEmpty();
    });
  }

  /**
   * Whether `move` takes a piece, including en passant. Castling never
   * captures.
   */
  isCapture(move: Move): boolean {
    if (isCastling(move)) return false;
    return (
      this.board[opposite(this.turn)].has(move.to)
      || (move.role === 'pawn' && move.to === this.epSquare && squareFile(move.from) !== squareFile(move.to))
    );
  }

  /**
   * Tells how much of the source square written notation needs for the
   * legal `move`: pawns name their file when capturing, kings and castling
   * never need anything, other pieces look at same-role pieces that could
   * legally go to the same square.
   */
  moveAmbiguity(move: Move): Result<Ambiguity, IllegalMoveError> {
    if (!this.isLegal(move)) return Result.err(new IllegalMoveError(move));
    if (isCastling(move)) return Result.ok('neither');
    switch (move.role) {
      case 'pawn':
        return Result.ok(squareFile(move.from) !== squareFile(move.to) ? 'file' : 'neither');
      case 'king':
        return Result.ok('neither');
      case 'knight':
      case 'bishop':
      case 'rook':
      case 'queen': {
        let candidates = SquareSet.empty();
        for (const from of this.pieces(this.turn, move.role).without(move.from)) {
          if (this.isLegal({ role: move.role, from, to: move.to })) candidates = candidates.with(from);
        }
        if (candidates.isEmpty()) return Result.ok('neither');
        if (candidates.isDisjoint(SquareSet.fromFile(squareFile(move.from)))) return Result.ok('file');
        return Result.ok('square');
      }
    }
  }

  toSetup(): Setup {
    return {
      board: this.board.clone(),
      turn: this.turn,
      castlingRights: { ...this.rights },
      epSquare: this.epSquare,
      halfmoves: this.halfmoves,
      fullmoves: this.fullmoves,
    };
  }

  toBuilder(): BoardBuilder {
    return BoardBuilder.fromSetup(this.toSetup());
  }

  toFen(): string {
    return makeFen(this.toBuilder());
  }
}
