import { getHttpStatus, queryInt, queryString } from '../../src/api/middleware';
import { createTypedError } from '../../src/domain/errors';

const status = (code: string) => getHttpStatus(createTypedError({ code, message: code }));

describe('getHttpStatus', () => {
  test('maps error codes to HTTP statuses', () => {
    expect(status('SWAP.NOT_FOUND')).toBe(404);
    expect(status('VALIDATION.SCHEMA')).toBe(400);
    expect(status('VERSION.PARSE')).toBe(400);
    expect(status('CONSTRAINT.PARSE')).toBe(400);
    expect(status('CONFIG.INVALID')).toBe(400);
    expect(status('SWAP.IN_PROGRESS')).toBe(409);
    expect(status('SWAP.ALREADY_REGISTERED')).toBe(409);
    expect(status('SWAP.DRAIN_TIMEOUT')).toBe(422);
    expect(status('SWAP.POLICY_REJECTED')).toBe(422);
    expect(status('INSTANCE.UNAVAILABLE')).toBe(503);
    expect(status('SYSTEM.INTERNAL')).toBe(500);
  });
});

describe('query helpers', () => {
  test('queryString takes the first string value', () => {
    expect(queryString('a')).toBe('a');
    expect(queryString(['b', 'c'])).toBe('b');
    expect(queryString(undefined)).toBeUndefined();
    expect(queryString({ nested: 'x' })).toBeUndefined();
  });

  test('queryInt falls back on absent or invalid values and caps at max', () => {
    expect(queryInt(undefined, 100, 1000)).toBe(100);
    expect(queryInt('abc', 100, 1000)).toBe(100);
    expect(queryInt('-3', 100, 1000)).toBe(100);
    expect(queryInt('25', 100, 1000)).toBe(25);
    expect(queryInt('5000', 100, 1000)).toBe(1000);
  });
});
