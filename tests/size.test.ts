import assert from 'node:assert/strict';
import { constants } from 'node:buffer';
import test from 'node:test';
import { UsageError } from '../src/errors.js';
import { parseSize } from '../src/size.js';

test('parseSize handles binary suffixes', () => {
  assert.equal(parseSize('512B'), 512);
  assert.equal(parseSize('1KB'), 1024);
  assert.equal(parseSize('10MB'), 10 * 1024 * 1024);
  assert.equal(parseSize('0.25GB'), 256 * 1024 * 1024);
});

test('parseSize is case-insensitive and ignores surrounding whitespace', () => {
  assert.equal(parseSize(' 2kb '), 2048);
  assert.equal(parseSize('3Mb'), 3 * 1024 * 1024);
});

test('parseSize accepts bare byte counts and fractional sizes', () => {
  assert.equal(parseSize('0'), 0);
  assert.equal(parseSize('777'), 777);
  assert.equal(parseSize('1.5KB'), 1536);
  assert.equal(parseSize('0.001KB'), 1);
});

test('parseSize rejects malformed input', () => {
  for (const bad of ['', 'KB', 'lots', '-1KB', '1TB', '1e3', '1..5MB']) {
    assert.throws(() => parseSize(bad), UsageError, `expected "${bad}" to be rejected`);
  }
});

test('parseSize rejects sizes larger than a string can hold', () => {
  const limit = constants.MAX_STRING_LENGTH;
  assert.equal(parseSize(String(limit)), limit);
  assert.throws(() => parseSize(String(limit + 1)), UsageError);
  assert.throws(() => parseSize('1GB'), /exceeds the largest supported corpus/);
});
