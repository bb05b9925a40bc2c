import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { login, verify, getCurrentUser, type AuthContext } from './auth';
import { MemoryRepository } from '../../utils/test/memoryRepository';
import { createMockRequest, createTestConfig } from '../../utils/test/mockData';
import { MagicLinkStore } from '../../utils/auth/magicLink';
import { decodeAccessToken } from '../../utils/auth/token';
import { DEFAULT_CATEGORY_NAMES } from '../../data/category/defaults';
import { BadRequestError } from '../../utils/net/errors';

describe('Auth API', () => {
  let repository: MemoryRepository;
  let context: AuthContext;

  beforeEach(() => {
    repository = new MemoryRepository();
    context = {
      repository,
      magicLinks: new MagicLinkStore(15),
      config: createTestConfig(),
    };
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  describe('login', () => {
    it('should create the user with default categories and log the link', async () => {
      const result = await login(createMockRequest({ body: { email: '  Sam@Example.com ' } }), context);

      expect(result).toEqual({ message: 'Magic link created. Check the server logs.' });
      const user = await repository.findUserByEmail('sam@example.com');
      expect(user).not.toBeNull();
      expect(await repository.countCategories(user?.id ?? 0)).toBe(DEFAULT_CATEGORY_NAMES.length);
      expect(context.magicLinks.size).toBe(1);
      expect(console.log).toHaveBeenCalledWith(
        expect.stringContaining('Magic link for sam@example.com: http://localhost:4200/verify?token='),
      );
    });

    it('should not seed categories again for a returning user', async () => {
      const user = await repository.createUser('sam@example.com', null);
      await repository.createCategory({ userId: user.id, name: 'Only one' });

      await login(createMockRequest({ body: { email: 'sam@example.com' } }), context);

      expect(await repository.countCategories(user.id)).toBe(1);
    });

    it('should reject an email without @', async () => {
      await expect(login(createMockRequest({ body: { email: 'not-an-email' } }), context)).rejects.toThrow(
        new BadRequestError('Invalid email address'),
      );
    });
  });

  describe('verify', () => {
    it('should exchange a magic link token for an access token once', async () => {
      const user = await repository.createUser('sam@example.com', null);
      const { token } = context.magicLinks.issue('sam@example.com');

      const result = await verify(createMockRequest({ body: { token } }), context);

      expect(result.tokenType).toBe('bearer');
      expect(decodeAccessToken(result.accessToken, 'test-secret')).toBe(user.id);
      await expect(verify(createMockRequest({ body: { token } }), context)).rejects.toThrow(
        new BadRequestError('Invalid or expired token'),
      );
    });

    it('should require a token', async () => {
      await expect(verify(createMockRequest({ body: {} }), context)).rejects.toThrow(
        new BadRequestError('Token is required'),
      );
    });

    it('should refuse a token for a deactivated user', async () => {
      const user = await repository.createUser('sam@example.com', null);
      repository.deactivateUser(user.id);
      const { token } = context.magicLinks.issue('sam@example.com');

      await expect(verify(createMockRequest({ body: { token } }), context)).rejects.toThrow(
        new BadRequestError('Invalid or expired token'),
      );
    });
  });

  describe('getCurrentUser', () => {
    it('should return the authenticated user', async () => {
      const user = await repository.createUser('sam@example.com', 'Sam');

      const current = await getCurrentUser(createMockRequest({ userId: user.id }), repository);

      expect(current).toMatchObject({ id: user.id, email: 'sam@example.com', name: 'Sam' });
    });
  });
});
