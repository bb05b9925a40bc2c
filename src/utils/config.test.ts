import { describe, it, expect } from 'vitest';
import { loadConfig } from './config';
import { createAccessToken, decodeAccessToken } from './auth/token';

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig({});

    expect(config).toEqual({
      port: 5002,
      jwtSecret: 'budget-compass-development-secret',
      accessTokenExpireMinutes: 30,
      magicLinkExpireMinutes: 15,
      magicLinkBaseUrl: 'http://localhost:4200/verify',
      corsOrigins: ['http://localhost:4200', 'http://127.0.0.1:4200'],
      mysql: { host: 'localhost', port: 3306, user: '', password: '', database: 'budget_compass' },
    });
  });

  it('should read values from the environment', () => {
    const config = loadConfig({
      PORT: '8080',
      JWT_SECRET: 'test-secret',
      ACCESS_TOKEN_EXPIRE_MINUTES: '60',
      MAGIC_LINK_EXPIRE_MINUTES: 'soon',
      CORS_ORIGINS: 'https://budget.test, ,https://admin.budget.test',
      MYSQL_HOST: 'db',
      MYSQL_USERNAME: 'budget',
      MYSQL_DATABASE: 'budgets',
    });

    expect(config.port).toBe(8080);
    expect(config.jwtSecret).toBe('test-secret');
    expect(config.accessTokenExpireMinutes).toBe(60);
    expect(config.magicLinkExpireMinutes).toBe(15);
    expect(config.corsOrigins).toEqual(['https://budget.test', 'https://admin.budget.test']);
    expect(config.mysql).toMatchObject({ host: 'db', user: 'budget', database: 'budgets' });
  });

  it('should sign tokens with the development secret when none is set', () => {
    const { jwtSecret, accessTokenExpireMinutes } = loadConfig({ NODE_ENV: 'development' });
    const token = createAccessToken(7, jwtSecret, accessTokenExpireMinutes);

    expect(decodeAccessToken(token, jwtSecret)).toBe(7);
  });

  it('should insist on a JWT secret in production', () => {
    expect(() => loadConfig({ NODE_ENV: 'production' })).toThrow('JWT_SECRET must be set in production');
  });
});
