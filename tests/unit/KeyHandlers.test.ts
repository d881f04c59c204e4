import { describe, it, expect } from 'vitest';
import { ValidationError } from '../../src/common/Errors';
import { parseLimit, parseListQuery, parseSetRequest } from '../../src/server/KeyHandlers';

describe('parseSetRequest', () => {
  it('reads value and expiration', () => {
    expect(parseSetRequest('{"value":"Hello","expiration":3600}')).toEqual({ value: 'Hello', expiration: 3600 });
  });

  it('leaves expiration out when absent or null', () => {
    expect(parseSetRequest('{"value":"v"}')).toEqual({ value: 'v' });
    expect(parseSetRequest('{"value":"v","expiration":null}')).toEqual({ value: 'v' });
  });

  it('keeps a non-positive expiration for the store to ignore', () => {
    expect(parseSetRequest('{"value":"v","expiration":0}')).toEqual({ value: 'v', expiration: 0 });
    expect(parseSetRequest('{"value":"v","expiration":-5}')).toEqual({ value: 'v', expiration: -5 });
  });

  it.each([
    ['an empty body', ''],
    ['malformed JSON', '{"value":'],
    ['an array', '["v"]'],
    ['null', 'null'],
    ['a number value', '{"value":5}'],
    ['a string expiration', '{"value":"v","expiration":"10"}'],
    ['a fractional expiration', '{"value":"v","expiration":1.5}'],
  ])('rejects %s as an invalid body', (_label, raw) => {
    expect(() => parseSetRequest(raw)).toThrow(new ValidationError('invalid request body'));
  });

  it.each([
    ['a missing value', '{}'],
    ['an empty value', '{"value":""}'],
    ['a null value', '{"value":null}'],
  ])('rejects %s as value required', (_label, raw) => {
    expect(() => parseSetRequest(raw)).toThrow('value is required');
  });
});

describe('parseLimit', () => {
  it.each([
    [undefined, 100],
    ['', 100],
    ['1', 1],
    ['250', 250],
    ['1000', 1000],
    ['0', 100],
    ['1001', 100],
    ['5000', 100],
    ['-3', 100],
    ['abc', 100],
    ['25abc', 25],
    [' 7', 7],
    ['+12', 12],
  ])('reads %j as %d', (raw, expected) => {
    expect(parseLimit(raw)).toBe(expected);
  });
});

describe('parseListQuery', () => {
  it('defaults pattern and limit', () => {
    expect(parseListQuery({})).toEqual({ pattern: '*', limit: 100 });
  });

  it('treats an empty pattern as match-all', () => {
    expect(parseListQuery({ pattern: '' })).toEqual({ pattern: '*', limit: 100 });
  });

  it('passes the pattern through untouched', () => {
    expect(parseListQuery({ pattern: 'user:[0-9]*', limit: '10' })).toEqual({ pattern: 'user:[0-9]*', limit: 10 });
  });

  it('takes the first of repeated parameters', () => {
    expect(parseListQuery({ pattern: ['a*', 'b*'], limit: ['5', '6'] })).toEqual({ pattern: 'a*', limit: 5 });
  });
});
