import assert from 'node:assert/strict';
import test from 'node:test';
import { decimalToFixed, fixedToDecimal, isFixedCoordinate } from './coordinates';
import { FormatError } from './errors';

function assertClose(actual: number, expected: number, tolerance = 1e-6) {
  assert.ok(
    Math.abs(actual - expected) <= tolerance,
    `Expected ${actual} to be within ${tolerance} of ${expected}`
  );
}

test('encodes decimal degrees as fixed-width degrees and thousandths of minutes', () => {
  assert.equal(decimalToFixed(52.765233, true), '5245.914N');
  assert.equal(decimalToFixed(23.186783, false), '02311.207E');
  assert.equal(decimalToFixed(-33.5, true), '3330.000S');
  assert.equal(decimalToFixed(-0.5, false), '00030.000W');
  assert.equal(decimalToFixed(0, true), '0000.000N');
  assert.equal(decimalToFixed(0, false), '00000.000E');
});

test('carries rounded minutes of 60 into the degrees', () => {
  assert.equal(decimalToFixed(10.99999999, true), '1100.000N');
  assert.equal(decimalToFixed(-179.99999999, false), '18000.000W');
});

test('decodes strict DDMM.mmm and DDDMM.mmm tokens with hemisphere sign', () => {
  assertClose(fixedToDecimal('5245.914N'), 52.765233);
  assertClose(fixedToDecimal('02311.207E'), 23.186783);
  assert.equal(fixedToDecimal('3330.000S'), -33.5);
  assert.equal(fixedToDecimal('00030.000W'), -0.5);
  assertClose(fixedToDecimal(' 5245.914n '), 52.765233);
});

test('decodes loose minute runs after the fixed degree digits', () => {
  assertClose(fixedToDecimal('5245.91404N'), 52 + 45.91404 / 60);
  assertClose(fixedToDecimal('02311.2E'), 23 + 11.2 / 60);
  assert.equal(fixedToDecimal('52N'), 52);
});

test('rejects tokens without a hemisphere letter or with malformed digits', () => {
  assert.throws(() => fixedToDecimal('5245.914X'), FormatError);
  assert.throws(() => fixedToDecimal('5245.914'), FormatError);
  assert.throws(() => fixedToDecimal('5A45.914N'), {
    name: 'FormatError',
    message: "Coordinate '5A45.914N' has no valid degree digits"
  });
  assert.throws(() => fixedToDecimal('52A5.914N'), {
    name: 'FormatError',
    message: "Coordinate '52A5.914N' has invalid minutes 'A5.914'"
  });
});

test('recognizes fixed coordinate tokens', () => {
  assert.equal(isFixedCoordinate('5245.914N'), true);
  assert.equal(isFixedCoordinate('02311.207e'), true);
  assert.equal(isFixedCoordinate('52.765233'), false);
  assert.equal(isFixedCoordinate(''), false);
});

test('decoding an encoded coordinate stays within a thousandth of a minute', () => {
  const samples: Array<[number, boolean]> = [
    [89.999, true],
    [-89.999, true],
    [47.123456, true],
    [-12.000017, true],
    [179.999, false],
    [-179.999, false],
    [8.54321, false],
    [-71.25, false]
  ];
  for (const [value, isLatitude] of samples) {
    assertClose(fixedToDecimal(decimalToFixed(value, isLatitude)), value, 1 / 60_000);
  }
});
