import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { createAccessToken, decodeAccessToken, getTokenFromHeader } from './token';

describe('Token Utilities', () => {
  it('should round trip the user id', () => {
    const token = createAccessToken(12, 'test-secret', 30);

    expect(decodeAccessToken(token, 'test-secret')).toBe(12);
  });

  it('should expire after the given minutes', () => {
    const token = createAccessToken(12, 'test-secret', 30);
    const payload = jwt.decode(token);

    expect(payload).toMatchObject({ userId: 12 });
    if (payload === null || typeof payload === 'string' || payload.exp === undefined || payload.iat === undefined) {
      throw new Error('expected exp and iat claims');
    }
    expect(payload.exp - payload.iat).toBe(1800);
  });

  it('should reject tokens signed with another secret', () => {
    expect(decodeAccessToken(createAccessToken(12, 'other-secret', 30), 'test-secret')).toBeNull();
  });

  it('should reject expired and malformed tokens', () => {
    const expired = jwt.sign({ userId: 12, exp: Math.floor(Date.now() / 1000) - 10 }, 'test-secret');

    expect(decodeAccessToken(expired, 'test-secret')).toBeNull();
    expect(decodeAccessToken('not.a.token', 'test-secret')).toBeNull();
    expect(decodeAccessToken(undefined, 'test-secret')).toBeNull();
  });

  it('should reject tokens without a numeric user id', () => {
    expect(decodeAccessToken(jwt.sign({ userId: '12' }, 'test-secret'), 'test-secret')).toBeNull();
  });

  it('should read bearer and bare tokens from the header', () => {
    expect(getTokenFromHeader('Bearer abc.def')).toBe('abc.def');
    expect(getTokenFromHeader('bearer   abc.def')).toBe('abc.def');
    expect(getTokenFromHeader('abc.def')).toBe('abc.def');
    expect(getTokenFromHeader(undefined)).toBeUndefined();
  });
});
