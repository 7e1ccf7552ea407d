import { expect, test } from 'vitest';
import { SquareSet } from './squareSet.js';

test('full set has all', () => {
  for (let square = 0; square < 64; square++) {
    expect(SquareSet.full().has(square)).toBe(true);
  }
  expect(SquareSet.full().size()).toBe(64);
});

test('size', () => {
  let squares = SquareSet.empty();
  for (let i = 0; i < 64; i++) {
    expect(squares.size()).toBe(i);
    squares = squares.with(i);
  }
});

test('ranks and files', () => {
  expect([...SquareSet.fromRank(1)]).toEqual([8, 9, 10, 11, 12, 13, 14, 15]);
  expect([...SquareSet.fromFile(7)]).toEqual([7, 15, 23, 31, 39, 47, 55, 63]);
  expect(SquareSet.backrank('black').equals(SquareSet.fromRank(7))).toBe(true);
});

test('iterates from the lowest index up', () => {
  const squares = SquareSet.fromSquares([40, 3, 33]);
  expect([...squares]).toEqual([3, 33, 40]);
  expect([...squares.reversed()]).toEqual([40, 33, 3]);
});

test('first and last', () => {
  const squares = SquareSet.fromSquares([40, 3, 33]);
  expect(squares.first()).toBe(3);
  expect(squares.last()).toBe(40);
  expect(squares.withoutFirst().first()).toBe(33);
  expect(SquareSet.empty().first()).toBeUndefined();
  expect(SquareSet.empty().last()).toBeUndefined();
  expect(SquareSet.fromSquare(63).first()).toBe(63);
});

test('more than one', () => {
  expect(SquareSet.empty().moreThanOne()).toBe(false);
  expect(SquareSet.fromSquare(5).moreThanOne()).toBe(false);
  expect(SquareSet.fromSquare(40).moreThanOne()).toBe(false);
  expect(SquareSet.fromSquares([5, 40]).moreThanOne()).toBe(true);
  expect(SquareSet.fromSquares([40, 41]).moreThanOne()).toBe(true);
});

test('single square', () => {
  expect(SquareSet.fromSquare(40).singleSquare()).toBe(40);
  expect(SquareSet.fromSquares([5, 40]).singleSquare()).toBeUndefined();
  expect(SquareSet.empty().singleSquare()).toBeUndefined();
});

test('set algebra', () => {
  const a = SquareSet.fromSquares([1, 2, 35]);
  const b = SquareSet.fromSquares([2, 35, 60]);
  expect([...a.union(b)]).toEqual([1, 2, 35, 60]);
  expect([...a.intersect(b)]).toEqual([2, 35]);
  expect([...a.xor(b)]).toEqual([1, 60]);
  expect([...a.diff(b)]).toEqual([1]);
  expect(a.intersects(b)).toBe(true);
  expect(a.isDisjoint(SquareSet.fromSquare(0))).toBe(true);
  expect(SquareSet.empty().complement().equals(SquareSet.full())).toBe(true);
  expect(a.complement().size()).toBe(61);
});

test('with, without and toggle', () => {
  const squares = SquareSet.empty().with(12).with(50);
  expect(squares.has(12)).toBe(true);
  expect(squares.without(12).has(12)).toBe(false);
  expect(squares.toggle(50).has(50)).toBe(false);
  expect(squares.toggle(51).has(51)).toBe(true);
});

test('light and dark squares', () => {
  expect(SquareSet.lightSquares().size()).toBe(32);
  expect(SquareSet.lightSquares().has(7)).toBe(true);
  expect(SquareSet.lightSquares().has(0)).toBe(false);
  expect(SquareSet.darkSquares().equals(SquareSet.lightSquares().complement())).toBe(true);
});

test('shift', () => {
  expect(SquareSet.fromSquare(3).shl64(40).equals(SquareSet.fromSquare(43))).toBe(true);
  expect(SquareSet.fromSquare(43).shr64(40).equals(SquareSet.fromSquare(3))).toBe(true);
  expect(SquareSet.fromSquare(63).shl64(1).isEmpty()).toBe(true);
});

test('bigint conversion', () => {
  expect(SquareSet.fromSquare(63).toBigInt()).toBe(1n << 63n);
  expect(SquareSet.fromBigInt(0xffn).equals(SquareSet.fromRank(0))).toBe(true);
  expect(SquareSet.fromBigInt(SquareSet.corners().toBigInt()).equals(SquareSet.corners())).toBe(true);
});
