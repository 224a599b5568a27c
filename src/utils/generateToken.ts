import { CookieOptions } from 'express';
import jwt from 'jsonwebtoken';
import { AuthData } from '../types/auth';
import { TypedResponse } from '../types/typedResponse';
import { AppConfig } from './config';
import { UnauthorizedError } from './ErrorResponse';

type TokenConfig = Pick<AppConfig, 'adminId' | 'accessTokenSecret' | 'accessTokenExpireDays' | 'production'>;

const DAY_MS = 24 * 60 * 60 * 1000;

export const accessTokenOption = (config: TokenConfig, now = Date.now()): CookieOptions => ({
  expires: new Date(now + config.accessTokenExpireDays * DAY_MS),
  maxAge: config.accessTokenExpireDays * DAY_MS,
  httpOnly: true,
  sameSite: config.production ? 'none' : 'lax',
  secure: config.production,
});

export const signAccessToken = (adminId: string, config: TokenConfig): string =>
  jwt.sign({ id: adminId }, config.accessTokenSecret, {
    expiresIn: (config.accessTokenExpireDays * DAY_MS) / 1000,
  });

// Only tokens issued to the configured admin are accepted.
export const verifyAccessToken = (token: string, config: TokenConfig): string => {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, config.accessTokenSecret);
  } catch (err) {
    throw new UnauthorizedError(err instanceof jwt.TokenExpiredError ? 'Token has expired' : 'Invalid token');
  }

  const id: unknown = typeof decoded === 'object' ? decoded.id : undefined;
  if (id !== config.adminId) {
    throw new UnauthorizedError('Invalid token');
  }
  return id;
};

export const sendToken = (adminId: string, statusCode: number, res: TypedResponse<AuthData>, config: TokenConfig) => {
  const token = signAccessToken(adminId, config);

  res.cookie('access_token', token, accessTokenOption(config));

  res.status(statusCode).json({
    success: true,
    data: { admin: { id: adminId }, token },
  });
};
