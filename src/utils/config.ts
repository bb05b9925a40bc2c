import 'dotenv/config';

export type Config = {
  port: number;
  jwtSecret: string;
  accessTokenExpireMinutes: number;
  magicLinkExpireMinutes: number;
  magicLinkBaseUrl: string;
  corsOrigins: string[];
  mysql: {
    host: string;
    port: number;
    user: string;
    password: string;
    database: string;
  };
};

type Env = Record<string, string | undefined>;

const DEVELOPMENT_JWT_SECRET = 'budget-compass-development-secret';

function getNumber(value: string | undefined, defaultValue: number): number {
  if (!value) {
    return defaultValue;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

function getList(value: string | undefined, defaultValue: string[]): string[] {
  if (!value) {
    return defaultValue;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Builds the application configuration from environment variables
 * @param env - Environment to read, process.env by default
 * Outside production a missing JWT_SECRET falls back to a fixed development secret.
 * @throws Error if JWT_SECRET is missing in production
 */
export function loadConfig(env: Env = process.env): Config {
  if (!env.JWT_SECRET && env.NODE_ENV === 'production') {
    throw new Error('JWT_SECRET must be set in production');
  }
  const jwtSecret = env.JWT_SECRET || DEVELOPMENT_JWT_SECRET;

  return {
    port: getNumber(env.PORT, 5002),
    jwtSecret,
    accessTokenExpireMinutes: getNumber(env.ACCESS_TOKEN_EXPIRE_MINUTES, 30),
    magicLinkExpireMinutes: getNumber(env.MAGIC_LINK_EXPIRE_MINUTES, 15),
    magicLinkBaseUrl: env.MAGIC_LINK_BASE_URL || 'http://localhost:4200/verify',
    corsOrigins: getList(env.CORS_ORIGINS, ['http://localhost:4200', 'http://127.0.0.1:4200']),
    mysql: {
      host: env.MYSQL_HOST || 'localhost',
      port: getNumber(env.MYSQL_PORT, 3306),
      user: env.MYSQL_USERNAME || '',
      password: env.MYSQL_PASSWORD || '',
      database: env.MYSQL_DATABASE || 'budget_compass',
    },
  };
}
