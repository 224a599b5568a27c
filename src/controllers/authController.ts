import bcrypt from 'bcryptjs';
import { NextFunction } from 'express';
import { asyncHandler } from '../middleware/asyncHandler';
import { AuthData, LoginDTO } from '../types/auth';
import { TypedRequest } from '../types/typedRequest';
import { TypedResponse } from '../types/typedResponse';
import type { AppConfig } from '../utils/config';
import { UnauthorizedError, ValidationError } from '../utils/ErrorResponse';
import { sendToken } from '../utils/generateToken';

type AuthConfig = Pick<
  AppConfig,
  'adminId' | 'adminPasswordHash' | 'accessTokenSecret' | 'accessTokenExpireDays' | 'production'
>;

export const createAuthController = (config: AuthConfig) => ({
  login: asyncHandler(
    async (req: TypedRequest<{}, {}, LoginDTO>, res: TypedResponse<AuthData>, next: NextFunction) => {
      const { adminId, password } = req.body;

      if (typeof adminId !== 'string' || typeof password !== 'string' || !adminId || !password) {
        return next(new ValidationError('Admin ID and password are required'));
      }

      // no hash configured means password login is disabled
      const isMatch =
        adminId === config.adminId &&
        config.adminPasswordHash !== undefined &&
        (await bcrypt.compare(password, config.adminPasswordHash));

      if (!isMatch) {
        return next(new UnauthorizedError('Invalid credentials'));
      }

      sendToken(config.adminId, 200, res, config);
    },
  ),

  logout: asyncHandler(async (_req: TypedRequest, res: TypedResponse<null>) => {
    res.clearCookie('access_token');
    res.status(200).json({ success: true, message: 'Logged out successfully', data: null });
  }),
});
