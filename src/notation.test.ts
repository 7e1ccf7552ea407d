import { expect, test } from 'vitest';
import { makeMove, parseMove } from './notation.js';

const moveError = (text: string): string | undefined => parseMove(text).unwrap(_ => undefined, err => err.message);

test('parse pawn moves', () => {
  expect(parseMove('e2e4').unwrap()).toEqual({ role: 'pawn', from: 12, to: 28 });
  expect(parseMove('e7e8=Q').unwrap()).toEqual({ role: 'pawn', from: 52, to: 60, promotion: 'queen' });
  expect(parseMove('a2a1=n').unwrap()).toEqual({ role: 'pawn', from: 8, to: 0, promotion: 'knight' });
});

test('parse piece moves', () => {
  expect(parseMove('Qa1a8').unwrap()).toEqual({ role: 'queen', from: 0, to: 56 });
  expect(parseMove('nb1c3').unwrap()).toEqual({ role: 'knight', from: 1, to: 18 });
  expect(parseMove('Pe2e4').unwrap()).toEqual({ role: 'pawn', from: 12, to: 28 });
});

test('parse castling', () => {
  expect(parseMove('O-O').unwrap()).toEqual({ castle: 'kingside' });
  expect(parseMove('O-O-O').unwrap()).toEqual({ castle: 'queenside' });
});

test('invalid moves', () => {
  expect(moveError('e2e')).toBe('ERR_MOVE_LENGTH');
  expect(moveError('Qxa1a8')).toBe('ERR_MOVE_LENGTH');
  expect(moveError('Xe2e4')).toBe('ERR_MOVE_ROLE');
  expect(moveError('e2e9')).toBe('ERR_MOVE_SQUARE');
  expect(moveError('i2e4')).toBe('ERR_MOVE_SQUARE');
  expect(moveError('e7e8=P')).toBe('ERR_PROMOTION');
  expect(moveError('e7e8=K')).toBe('ERR_PROMOTION');
  expect(moveError('e7e8=')).toBe('ERR_PROMOTION');
  expect(moveError('Ne7e8=Q')).toBe('ERR_PROMOTION');
});

test('error keeps the input', () => {
  expect(parseMove('e2e').unwrap(_ => undefined, err => err.text)).toBe('e2e');
});

test('make moves', () => {
  expect(makeMove({ role: 'pawn', from: 12, to: 28 })).toBe('e2e4');
  expect(makeMove({ role: 'queen', from: 3, to: 39 })).toBe('Qd1h5');
  expect(makeMove({ role: 'pawn', from: 52, to: 60, promotion: 'queen' })).toBe('e7e8=Q');
  expect(makeMove({ castle: 'queenside' })).toBe('O-O-O');
});

test.each(['e2e4', 'Ng1f3', 'e7e8=R', 'O-O', 'O-O-O', 'Kh8g8'])('parse and make %s', text => {
  expect(makeMove(parseMove(text).unwrap())).toBe(text);
});
