import { NextFunction, Request, RequestHandler, Response } from 'express';
import type { Repository } from '../io/types';
import { decodeAccessToken, getTokenFromHeader } from './token';
import { UnauthorizedError } from '../net/errors';

declare global {
  namespace Express {
    interface Request {
      userId?: number;
    }
  }
}

/**
 * Builds the middleware that authenticates a request from its Authorization
 * header and stores the user id on the request
 * @param repository - Used to check that the user still exists and is active
 * @param secret - JWT signing secret
 */
export function createVerifyToken(repository: Repository, secret: string): RequestHandler {
  return async (req: Request, _res: Response, next: NextFunction) => {
    try {
      const userId = decodeAccessToken(getTokenFromHeader(req.headers.authorization), secret);
      if (userId === null) {
        throw new UnauthorizedError();
      }
      const user = await repository.findUserById(userId);
      if (!user || !user.isActive) {
        throw new UnauthorizedError();
      }
      req.userId = user.id;
      next();
    } catch (error) {
      next(error);
    }
  };
}
