import { expect, test } from 'vitest';
import { Position } from './chess.js';
import { parseMove } from './notation.js';
import { makeSan, makeSanLine } from './san.js';
import { Move } from './types.js';

const move = (text: string): Move => parseMove(text).unwrap();

const san = (fen: string, text: string): string => makeSan(Position.fromFen(fen).unwrap(), move(text)).unwrap();

const line = (texts: string): Move[] => texts.split(' ').map(move);

test('pawn and piece moves', () => {
  const pos = Position.default();
  expect(makeSan(pos, move('e2e4')).unwrap()).toBe('e4');
  expect(makeSan(pos, move('Ng1f3')).unwrap()).toBe('Nf3');
});

test('captures and checks', () => {
  expect(san('k7/1q6/8/8/8/8/6Q1/5K2 w - - 0 1', 'Qg2b7')).toBe('Qxb7+');
  expect(san('rnbqkbnr/ppp1ppp1/8/3pP2p/8/8/PPPP1PPP/RNBQKBNR w - d6 0 2', 'e5d6')).toBe('exd6');
});

test('promotions', () => {
  expect(san('1r5k/P7/7K/8/8/8/8/8 w - - 0 1', 'a7b8=Q')).toBe('axb8=Q#');
  expect(san('1r5k/P7/7K/8/8/8/8/8 w - - 0 1', 'a7a8=Q')).toBe('a8=Q');
});

test('castling', () => {
  expect(san('r3k2r/pppppppp/8/8/8/8/PPPPPPPP/R3K2R w KQkq - 0 1', 'O-O')).toBe('O-O');
  expect(san('r3k2r/pppppppp/8/8/8/8/PPPPPPPP/R3K2R w KQkq - 0 1', 'O-O-O')).toBe('O-O-O');
});

test('disambiguation', () => {
  expect(san('7k/8/8/1N6/8/8/8/1N5K w - - 0 1', 'Nb1c3')).toBe('Nb1c3');
  expect(san('7k/8/8/8/8/8/8/1N3N1K w - - 0 1', 'Nb1d2')).toBe('Nbd2');
  expect(san('7k/8/8/8/8/8/8/1Nr2N1K w - - 0 1', 'Nb1d2')).toBe('Nd2');
});

test('illegal move', () => {
  expect(makeSan(Position.default(), move('e2e5')).isErr).toBe(true);
});

test('numbered line', () => {
  expect(makeSanLine(Position.default(), line('e2e4 e7e5 Qd1h5 Ke8e7 Qh5e5')).unwrap()).toBe(
    '1. e4 e5 2. Qh5 Ke7 3. Qxe5#',
  );
  expect(makeSanLine(Position.default(), []).unwrap()).toBe('');
});

test('line starting with black', () => {
  const pos = Position.fromFen('rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b KQkq e3 0 1').unwrap();
  expect(makeSanLine(pos, line('e7e5 Ng1f3')).unwrap()).toBe('1... e5 2. Nf3');
});

test('line with an illegal move', () => {
  expect(makeSanLine(Position.default(), line('e2e4 e2e4')).isErr).toBe(true);
});
