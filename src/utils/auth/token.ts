import jwt from 'jsonwebtoken';

/**
 * Signs an access token carrying the user id
 * @param userId - Id of the authenticated user
 * @param secret - JWT signing secret
 * @param expireMinutes - Lifetime of the token
 */
export function createAccessToken(userId: number, secret: string, expireMinutes: number): string {
  return jwt.sign({ userId }, secret, { expiresIn: expireMinutes * 60 });
}

/**
 * Returns the user id carried by a valid token, or null when the token is
 * missing, malformed, expired or signed with another secret
 */
export function decodeAccessToken(token: string | undefined, secret: string): number | null {
  if (!token) {
    return null;
  }
  try {
    const decoded = jwt.verify(token, secret);
    if (typeof decoded === 'object' && typeof decoded.userId === 'number') {
      return decoded.userId;
    }
    return null;
  } catch {
    return null;
  }
}

/**
 * Accepts both "Bearer <token>" and a bare token
 */
export function getTokenFromHeader(header: string | undefined): string | undefined {
  if (!header) {
    return undefined;
  }
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match ? match[1] : header.trim();
}
