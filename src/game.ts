import { Result } from '@badrap/result';
import { IllegalMoveError, Position, PositionError } from './chess.js';
import { EngineContext } from './context.js';
import { FenError } from './fen.js';
import { moduleLogger } from './logger.js';
import { makeMove } from './notation.js';
import { makeSanLine } from './san.js';
import { Color, Move } from './types.js';

const log = moduleLogger('game');

export type GameAction =
  | { type: 'move'; move: Move }
  | { type: 'offerDraw' }
  | { type: 'acceptDraw' }
  | { type: 'declineDraw' }
  | { type: 'resign' };

export type GameStatus =
  | { kind: 'ongoing' }
  | { kind: 'checkmate'; loser: Color }
  | { kind: 'resigned'; loser: Color }
  | { kind: 'stalemate' }
  | { kind: 'repetition' }
  | { kind: 'fiftyMoves' }
  | { kind: 'insufficientMaterial' }
  | { kind: 'drawAccepted' };

export enum IllegalAction {
  GameFinished = 'ERR_GAME_FINISHED',
  NoDrawOffer = 'ERR_NO_DRAW_OFFER',
  DrawOfferPending = 'ERR_DRAW_OFFER_PENDING',
}

export class GameError extends Error {
  constructor(
    readonly code: IllegalAction,
    readonly action: GameAction,
  ) {
    super(code);
  }
}

/** Occurrences of a position that end the game in a draw. */
export const REPETITION_LIMIT = 3;

/** Half-moves without capture or pawn move that end the game in a draw. */
export const FIFTY_MOVES_LIMIT = 100;

const actionText = (action: GameAction): string => (action.type === 'move' ? makeMove(action.move) : action.type);

/**
 * A game from a starting position: the positions reached, the actions
 * taken, and how often each position occurred.
 *
 * The state changes only through {@link Game.apply}. Once the status is no
 * longer `ongoing`, every action is rejected.
 */
export class Game {
  private _position: Position;
  private _status: GameStatus;
  private readonly _positions: Position[];
  private readonly _moves: Move[] = [];
  private readonly _actions: GameAction[] = [];
  private readonly occurrences = new Map<bigint, number>();

  private constructor(start: Position) {
    this._position = start;
    this._positions = [start];
    this.occurrences.set(start.hash, 1);
    this._status = this.positionStatus();
  }

  static default(ctx?: EngineContext): Game {
    return new Game(Position.default(ctx));
  }

  static fromPosition(pos: Position): Game {
    return new Game(pos);
  }

  static fromFen(fen: string, ctx?: EngineContext): Result<Game, FenError | PositionError> {
    return Position.fromFen(fen, ctx).map(pos => new Game(pos));
  }

  get position(): Position {
    return this._position;
  }

  get status(): GameStatus {
    return this._status;
  }

  get isOngoing(): boolean {
    return this._status.kind === 'ongoing';
  }

  /** Positions reached, starting position first. */
  get positions(): readonly Position[] {
    return this._positions;
  }

  get moves(): readonly Move[] {
    return this._moves;
  }

  get actions(): readonly GameAction[] {
    return this._actions;
  }

  get drawOfferPending(): boolean {
    return this._actions[this._actions.length - 1]?.type === 'offerDraw';
  }

  /** How many times `pos` has occurred in this game. */
  occurrencesOf(pos: Position): number {
    return this.occurrences.get(pos.hash) ?? 0;
  }

  legalMoves(): Move[] {
    return this.isOngoing ? this._position.legalMoves() : [];
  }

  apply(action: GameAction): Result<GameStatus, GameError | IllegalMoveError> {
    const reject = (code: IllegalAction) => {
      log.debug('action rejected', { action: actionText(action), code });
      return Result.err(new GameError(code, action));
    };
    if (!this.isOngoing) return reject(IllegalAction.GameFinished);

    switch (action.type) {
      case 'move': {
        if (this.drawOfferPending) return reject(IllegalAction.DrawOfferPending);
        const next = this._position.play(action.move);
        if (next.isErr) {
          log.debug('illegal move', { move: actionText(action) });
          return Result.err(next.error);
        }
        this._position = next.value;
        this._positions.push(next.value);
        this._moves.push(action.move);
        this.occurrences.set(next.value.hash, this.occurrencesOf(next.value) + 1);
        this._status = this.positionStatus();
        break;
      }
      case 'offerDraw':
        if (this.drawOfferPending) return reject(IllegalAction.DrawOfferPending);
        break;
      case 'acceptDraw':
        if (!this.drawOfferPending) return reject(IllegalAction.NoDrawOffer);
        this._status = { kind: 'drawAccepted' };
        break;
      case 'declineDraw':
        if (!this.drawOfferPending) return reject(IllegalAction.NoDrawOffer);
        break;
      case 'resign':
        this._status = { kind: 'resigned', loser: this._position.turn };
        break;
    }

    this._actions.push(action);
    log.debug('action applied', { action: actionText(action), status: this._status.kind });
    return Result.ok(this._status);
  }

  play(move: Move): Result<GameStatus, GameError | IllegalMoveError> {
    return this.apply({ type: 'move', move });
  }

  offerDraw(): Result<GameStatus, GameError | IllegalMoveError> {
    return this.apply({ type: 'offerDraw' });
  }

  acceptDraw(): Result<GameStatus, GameError | IllegalMoveError> {
    return this.apply({ type: 'acceptDraw' });
  }

  declineDraw(): Result<GameStatus, GameError | IllegalMoveError> {
    return this.apply({ type: 'declineDraw' });
  }

  resign(): Result<GameStatus, GameError | IllegalMoveError> {
    return this.apply({ type: 'resign' });
  }

  /** Moves so far in numbered algebraic notation. */
  sanLine(): Result<string, IllegalMoveError> {
    return makeSanLine(this._positions[0], this._moves);
  }

  private positionStatus(): GameStatus {
    const pos = this._position;
    const status = pos.status();
    if (status.kind !== 'ongoing') return status;
    if (this.occurrencesOf(pos) >= REPETITION_LIMIT) return { kind: 'repetition' };
    if (pos.halfmoves >= FIFTY_MOVES_LIMIT) return { kind: 'fiftyMoves' };
    if (pos.isInsufficientMaterial()) return { kind: 'insufficientMaterial' };
    return { kind: 'ongoing' };
  }
}
