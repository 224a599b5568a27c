import jwt from 'jsonwebtoken';
import { describe, expect, it } from 'vitest';
import { UnauthorizedError } from './ErrorResponse';
import { accessTokenOption, signAccessToken, verifyAccessToken } from './generateToken';

const config = {
  adminId: 'admin',
  accessTokenSecret: 'test-secret',
  accessTokenExpireDays: 2,
  production: false,
};

describe('access tokens', () => {
  it('round-trips the admin id', () => {
    expect(verifyAccessToken(signAccessToken('admin', config), config)).toBe('admin');
  });

  it('rejects tokens for anyone but the configured admin', () => {
    const token = signAccessToken('someone-else', config);

    expect(() => verifyAccessToken(token, config)).toThrow(new UnauthorizedError('Invalid token'));
  });

  it('rejects tokens signed with another secret', () => {
    const token = signAccessToken('admin', { ...config, accessTokenSecret: 'other-secret' });

    expect(() => verifyAccessToken(token, config)).toThrow('Invalid token');
  });

  it('rejects expired tokens', () => {
    const token = jwt.sign({ id: 'admin', exp: Math.floor(Date.now() / 1000) - 60 }, 'test-secret');

    expect(() => verifyAccessToken(token, config)).toThrow('Token has expired');
  });

  it('sizes the cookie to the token lifetime', () => {
    const options = accessTokenOption(config, 0);

    expect(options.maxAge).toBe(2 * 24 * 60 * 60 * 1000);
    expect(options.expires).toEqual(new Date(2 * 24 * 60 * 60 * 1000));
    expect(options.httpOnly).toBe(true);
    expect(options.sameSite).toBe('lax');
    expect(accessTokenOption({ ...config, production: true }).sameSite).toBe('none');
  });
});
