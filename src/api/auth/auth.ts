import { Request } from 'express';
import { z } from 'zod';
import type { Repository } from '../../utils/io/types';
import type { Config } from '../../utils/config';
import type { User } from '../../data/user/types';
import { MagicLinkStore, buildMagicLink } from '../../utils/auth/magicLink';
import { createAccessToken } from '../../utils/auth/token';
import { seedDefaultCategories } from '../../data/category/defaults';
import { getBody, getUserId } from '../../utils/net/request';
import { BadRequestError, UnauthorizedError } from '../../utils/net/errors';
import { log, warn } from '../../utils/log';

export type AuthContext = {
  repository: Repository;
  magicLinks: MagicLinkStore;
  config: Pick<Config, 'jwtSecret' | 'accessTokenExpireMinutes' | 'magicLinkBaseUrl'>;
};

const loginSchema = z.object({
  email: z.string({ required_error: 'Invalid email address' }),
});

const verifySchema = z.object({
  token: z.string().optional(),
});

/**
 * Finds the user for an email, creating it with the default categories when missing
 */
async function findOrCreateUser(repository: Repository, email: string): Promise<User> {
  const existing = await repository.findUserByEmail(email);
  if (existing) {
    return existing;
  }
  return repository.withTransaction(async (tx) => {
    const user = await tx.createUser(email, null);
    const seeded = await seedDefaultCategories(tx, user.id);
    log('Created user', email, { userId: user.id, categories: seeded });
    return user;
  });
}

/**
 * Issues a one-time login link for an email. The link is written to the log in
 * place of being emailed.
 *
 * @param request - Express request with { email } body
 * @throws BadRequestError if the email does not contain "@"
 */
export async function login(request: Request, context: AuthContext) {
  const email = getBody(request, loginSchema).email.trim().toLowerCase();
  if (!email.includes('@')) {
    throw new BadRequestError('Invalid email address');
  }

  await findOrCreateUser(context.repository, email);

  const { token, expiresAt } = context.magicLinks.issue(email);
  log(`Magic link for ${email}: ${buildMagicLink(context.config.magicLinkBaseUrl, token)}`, {
    expiresAt: expiresAt.toISOString(),
  });

  return { message: 'Magic link created. Check the server logs.' };
}

/**
 * Exchanges a magic-link token for an access token. Each token works once.
 *
 * @param request - Express request with { token } body
 * @throws BadRequestError if the token is missing, unknown, used or expired
 */
export async function verify(request: Request, context: AuthContext) {
  const { token } = getBody(request, verifySchema);
  if (!token) {
    throw new BadRequestError('Token is required');
  }

  const email = context.magicLinks.consume(token);
  if (!email) {
    warn('Rejected unknown or expired magic link token');
    throw new BadRequestError('Invalid or expired token');
  }

  const user = await context.repository.findUserByEmail(email);
  if (!user || !user.isActive) {
    throw new BadRequestError('Invalid or expired token');
  }

  const accessToken = createAccessToken(
    user.id,
    context.config.jwtSecret,
    context.config.accessTokenExpireMinutes,
  );
  return { accessToken, tokenType: 'bearer' };
}

/**
 * Returns the authenticated user
 */
export async function getCurrentUser(request: Request, repository: Repository): Promise<User> {
  const user = await repository.findUserById(getUserId(request));
  if (!user) {
    throw new UnauthorizedError();
  }
  return user;
}
