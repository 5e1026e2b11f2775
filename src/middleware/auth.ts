import { NextFunction, Request, Response } from 'express';
import { UserRepository, UserRecord } from '../store/types';
import { Actor, toActor } from '../services/actor';
import { verifyToken } from '../utils/generateToken';
import { sendError } from './errorHandler';
import { AuthenticationError } from '../utils/errors';

export interface AuthRequest extends Request {
  user?: UserRecord;
  actor?: Actor;
}

/**
 * Resolves the bearer token to a user and attaches the capability actor.
 * 401 without a valid token.
 */
export const protect =
  (users: UserRepository, secret?: string) =>
  async (req: AuthRequest, res: Response, next: NextFunction) => {
    try {
      const header = req.headers.authorization;
      if (!header || !header.startsWith('Bearer ')) {
        throw new AuthenticationError();
      }

      const userId = verifyToken(header.slice('Bearer '.length), secret);
      if (!userId) {
        throw new AuthenticationError('Not authorized, token failed');
      }

      const user = await users.findById(userId);
      if (!user) {
        throw new AuthenticationError('User not found');
      }

      req.user = user;
      req.actor = toActor(user);
      next();
    } catch (error) {
      sendError(res, error);
    }
  };

/** Narrows a protected request to its actor; protect() must have run first */
export const requireActor = (req: AuthRequest): Actor => {
  if (!req.actor) {
    throw new AuthenticationError();
  }
  return req.actor;
};
