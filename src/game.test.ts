import { Result } from '@badrap/result';
import { describe, expect, test } from 'vitest';
import { IllegalMoveError } from './chess.js';
import { Game, GameError, GameStatus } from './game.js';
import { parseMove } from './notation.js';
import { Move } from './types.js';

const move = (text: string): Move => parseMove(text).unwrap();

const playAll = (game: Game, line: string): void => {
  for (const text of line.split(' ')) game.play(move(text)).unwrap();
};

const actionError = (result: Result<GameStatus, GameError | IllegalMoveError>): string | undefined =>
  result.unwrap(_ => undefined, err => err.message);

describe('automatic endings', () => {
  test('checkmate', () => {
    const game = Game.default();
    playAll(game, 'e2e4 e7e5 Qd1h5 Ke8e7 Qh5e5');
    expect(game.status).toEqual({ kind: 'checkmate', loser: 'black' });
    expect(game.isOngoing).toBe(false);
    expect(game.legalMoves()).toEqual([]);
  });

  test('checkmate on f7', () => {
    const game = Game.default();
    playAll(game, 'e2e4 e7e5 Bf1c4 Nb8c6 Qd1f3 Nc6d4 Qf3f7');
    expect(game.status).toEqual({ kind: 'checkmate', loser: 'black' });
  });

  test('stalemate', () => {
    const game = Game.fromFen('3k4/3P4/4K3/8/8/8/8/8 w - - 0 1').unwrap();
    expect(game.play(move('Ke6d6')).unwrap()).toEqual({ kind: 'stalemate' });
  });

  test('threefold repetition', () => {
    const game = Game.fromFen('8/8/8/p3k3/P7/4K3/8/8 w - - 0 1').unwrap();
    const shuffle = 'Ke3d3 Ke5d5 Kd3e3 Kd5e5';
    playAll(game, shuffle);
    expect(game.occurrencesOf(game.position)).toBe(2);
    playAll(game, 'Ke3d3 Ke5d5 Kd3e3');
    expect(game.isOngoing).toBe(true);
    expect(game.play(move('Kd5e5')).unwrap()).toEqual({ kind: 'repetition' });
    expect(game.occurrencesOf(game.position)).toBe(3);
    expect(game.positions.length).toBe(9);
  });

  test('fifty moves', () => {
    const game = Game.fromFen('4k3/8/8/8/8/8/8/R3K3 w - - 99 60').unwrap();
    expect(game.isOngoing).toBe(true);
    expect(game.play(move('Ra1a2')).unwrap()).toEqual({ kind: 'fiftyMoves' });
  });

  test('insufficient material', () => {
    const game = Game.fromFen('4k3/8/6b1/8/8/3NK3/8/8 w - - 0 1').unwrap();
    expect(game.status).toEqual({ kind: 'insufficientMaterial' });
  });

  test('finished start position', () => {
    const game = Game.fromFen('Q2k4/8/3K4/8/8/8/8/8 b - - 0 1').unwrap();
    expect(game.status).toEqual({ kind: 'checkmate', loser: 'black' });
  });
});

describe('actions', () => {
  test('resign', () => {
    const game = Game.default();
    expect(game.resign().unwrap()).toEqual({ kind: 'resigned', loser: 'white' });
    expect(actionError(game.play(move('e2e4')))).toBe('ERR_GAME_FINISHED');
  });

  test('draw offer accepted', () => {
    const game = Game.default();
    game.play(move('e2e4')).unwrap();
    expect(game.offerDraw().unwrap()).toEqual({ kind: 'ongoing' });
    expect(game.drawOfferPending).toBe(true);
    expect(game.acceptDraw().unwrap()).toEqual({ kind: 'drawAccepted' });
    expect(actionError(game.resign())).toBe('ERR_GAME_FINISHED');
    expect(game.actions.map(action => action.type)).toEqual(['move', 'offerDraw', 'acceptDraw']);
  });

  test('draw offer declined', () => {
    const game = Game.default();
    game.offerDraw().unwrap();
    expect(actionError(game.play(move('e2e4')))).toBe('ERR_DRAW_OFFER_PENDING');
    expect(actionError(game.offerDraw())).toBe('ERR_DRAW_OFFER_PENDING');
    expect(game.declineDraw().unwrap()).toEqual({ kind: 'ongoing' });
    expect(game.drawOfferPending).toBe(false);
    expect(game.play(move('e2e4')).isOk).toBe(true);
  });

  test('no draw offer to answer', () => {
    const game = Game.default();
    expect(actionError(game.acceptDraw())).toBe('ERR_NO_DRAW_OFFER');
    expect(actionError(game.declineDraw())).toBe('ERR_NO_DRAW_OFFER');
    expect(game.actions).toEqual([]);
  });

  test('resign with a pending offer', () => {
    const game = Game.default();
    game.play(move('e2e4')).unwrap();
    game.offerDraw().unwrap();
    expect(game.resign().unwrap()).toEqual({ kind: 'resigned', loser: 'black' });
  });

  test('illegal move changes nothing', () => {
    const game = Game.default();
    expect(actionError(game.play(move('e2e5')))).toBe('ERR_ILLEGAL_MOVE e2e5');
    expect(game.moves).toEqual([]);
    expect(game.actions).toEqual([]);
    expect(game.positions.length).toBe(1);
    expect(game.isOngoing).toBe(true);
  });
});

describe('history', () => {
  test('moves and positions', () => {
    const game = Game.default();
    playAll(game, 'e2e4 e7e5');
    expect(game.moves).toEqual([move('e2e4'), move('e7e5')]);
    expect(game.positions.map(pos => pos.fullmoves)).toEqual([1, 1, 2]);
    expect(game.position.toFen()).toBe('rnbqkbnr/pppp1ppp/8/4p3/4P3/8/PPPP1PPP/RNBQKBNR w KQkq e6 0 2');
    expect(game.legalMoves().length).toBe(29);
  });

  test('san line', () => {
    const game = Game.default();
    playAll(game, 'e2e4 e7e5 Qd1h5 Ke8e7 Qh5e5');
    expect(game.sanLine().unwrap()).toBe('1. e4 e5 2. Qh5 Ke7 3. Qxe5#');
  });

  test('start counted once', () => {
    const game = Game.default();
    expect(game.occurrencesOf(game.position)).toBe(1);
  });

  test('invalid start', () => {
    expect(Game.fromFen('8/8/8/8/8/8/8/8 w - - 0 1').isErr).toBe(true);
  });
});
