import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { z } from 'zod';
import { logger } from '../utils/logger';

export interface AuthUser {
  id: string;
  role: string;
}

const accessTokenSchema = z.object({
  userId: z.string().min(1),
  role: z.string().min(1),
  type: z.string().optional(),
});

/**
 * Optional auth - attaches `req.user` for a valid access token and leaves the
 * request anonymous otherwise. Route guards decide what anonymous callers get.
 */
export const optionalAuth = (accessSecret: string) => {
  return (req: Request, _res: Response, next: NextFunction) => {
    const token = req.headers.authorization?.replace('Bearer ', '');

    if (!token) {
      return next();
    }

    try {
      const decoded = accessTokenSchema.parse(jwt.verify(token, accessSecret));

      // Refresh tokens must not open admin pages
      if (decoded.type && decoded.type !== 'access') {
        logger.debug({ path: req.path }, 'Ignoring non-access token');
        return next();
      }

      req.user = { id: decoded.userId, role: decoded.role };
    } catch (error) {
      logger.debug({ err: error, path: req.path }, 'Ignoring invalid access token');
    }

    next();
  };
};
