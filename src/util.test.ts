import { expect, test } from 'vitest';
import { Move } from './types.js';
import {
  charToRole,
  makeSquare,
  moveEquals,
  parseSquare,
  roleToChar,
  shiftSquare,
  squareFile,
  squareFromCoords,
  squareFromIndex,
  squareFromString,
  squareRank,
  isLightSquare,
} from './util.js';

test('parse square', () => {
  expect(parseSquare('a1')).toBe(0);
  expect(parseSquare('h1')).toBe(7);
  expect(parseSquare('e4')).toBe(28);
  expect(parseSquare('h8')).toBe(63);
  expect(parseSquare('i1')).toBeUndefined();
  expect(parseSquare('e44')).toBeUndefined();
});

test('make square', () => {
  expect(makeSquare(0)).toBe('a1');
  expect(makeSquare(28)).toBe('e4');
  expect(makeSquare(63)).toBe('h8');
});

test('every square survives name and coordinates', () => {
  for (let square = 0; square < 64; square++) {
    expect(parseSquare(makeSquare(square))).toBe(square);
    expect(squareFromCoords(squareFile(square), squareRank(square))).toBe(square);
  }
});

test('square from string', () => {
  expect(squareFromString('e4').unwrap()).toBe(28);
  expect(squareFromString('i4').unwrap(_ => undefined, err => err.message)).toBe('ERR_FILE');
  expect(squareFromString('e9').unwrap(_ => undefined, err => err.message)).toBe('ERR_RANK');
  expect(squareFromString('e').unwrap(_ => undefined, err => err.message)).toBe('ERR_SQUARE');
  expect(squareFromString('E4').unwrap(_ => undefined, err => err.message)).toBe('ERR_FILE');
});

test('square from index', () => {
  expect(squareFromIndex(63).unwrap()).toBe(63);
  expect(squareFromIndex(0).unwrap()).toBe(0);
  expect(squareFromIndex(64).unwrap(_ => undefined, err => err.message)).toBe('ERR_SQUARE_INDEX');
  expect(squareFromIndex(-1).unwrap(_ => undefined, err => err.message)).toBe('ERR_SQUARE_INDEX');
  expect(squareFromIndex(1.5).isErr).toBe(true);
});

test('shift square', () => {
  expect(shiftSquare(0, 1, 1)).toBe(9);
  expect(shiftSquare(7, 1, 0)).toBeUndefined();
  expect(shiftSquare(56, 0, 1)).toBeUndefined();
  expect(shiftSquare(28, -2, -1)).toBe(18);
});

test('light squares', () => {
  expect(isLightSquare(0)).toBe(false);
  expect(isLightSquare(7)).toBe(true);
  expect(isLightSquare(56)).toBe(true);
  expect(isLightSquare(63)).toBe(false);
});

test('role characters', () => {
  expect(roleToChar('knight')).toBe('n');
  expect(charToRole('Q')).toBe('queen');
  expect(charToRole('k')).toBe('king');
  expect(charToRole('x')).toBeUndefined();
});

test('move equality', () => {
  const push: Move = { role: 'pawn', from: 52, to: 60, promotion: 'queen' };
  expect(moveEquals(push, { role: 'pawn', from: 52, to: 60, promotion: 'queen' })).toBe(true);
  expect(moveEquals(push, { role: 'pawn', from: 52, to: 60, promotion: 'rook' })).toBe(false);
  expect(moveEquals({ castle: 'kingside' }, { castle: 'kingside' })).toBe(true);
  expect(moveEquals({ castle: 'kingside' }, push)).toBe(false);
});
