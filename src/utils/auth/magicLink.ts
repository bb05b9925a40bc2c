import { randomBytes } from 'crypto';
import dayjs from 'dayjs';
import { isBefore } from '../date/date';

type PendingLink = {
  email: string;
  expiresAt: Date;
};

export type IssuedLink = {
  token: string;
  expiresAt: Date;
};

/**
 * One-time login tokens kept in process memory. A token is valid until it is
 * consumed or its lifetime runs out, whichever comes first.
 */
export class MagicLinkStore {
  private links = new Map<string, PendingLink>();
  private ttlMinutes: number;
  private now: () => Date;

  constructor(ttlMinutes: number, now: () => Date = () => new Date()) {
    this.ttlMinutes = ttlMinutes;
    this.now = now;
  }

  issue(email: string): IssuedLink {
    this.purgeExpired();
    const token = randomBytes(32).toString('base64url');
    const expiresAt = dayjs(this.now()).add(this.ttlMinutes, 'minute').toDate();
    this.links.set(token, { email, expiresAt });
    return { token, expiresAt };
  }

  /**
   * Removes the token and returns its email, or null if it is unknown or expired
   */
  consume(token: string): string | null {
    const link = this.links.get(token);
    if (!link) {
      return null;
    }
    this.links.delete(token);
    if (!isBefore(this.now(), link.expiresAt)) {
      return null;
    }
    return link.email;
  }

  get size(): number {
    return this.links.size;
  }

  private purgeExpired(): void {
    const now = this.now();
    for (const [token, link] of this.links) {
      if (!isBefore(now, link.expiresAt)) {
        this.links.delete(token);
      }
    }
  }
}

/**
 * Builds the link that would be emailed to the user
 */
export function buildMagicLink(baseUrl: string, token: string): string {
  const separator = baseUrl.includes('?') ? '&' : '?';
  return `${baseUrl}${separator}token=${encodeURIComponent(token)}`;
}
