import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { verifyToken } from '@clerk/backend';

/**
 * Verifies Clerk session tokens and yields the Clerk user id (`sub`).
 * `verifyToken` resolves with the JWT payload and throws when the token is
 * invalid or expired.
 */
@Injectable()
export class ClerkTokenVerifier {
  private readonly logger = new Logger(ClerkTokenVerifier.name);

  constructor(private readonly config: ConfigService) {}

  async verify(token: string): Promise<string | null> {
    const secretKey = this.config.get<string>('clerk.secretKey');
    const jwtKey = this.config.get<string>('clerk.jwtKey');
    if (!secretKey && !jwtKey) {
      this.logger.error('Neither CLERK_SECRET_KEY nor CLERK_JWT_KEY is set');
      return null;
    }

    try {
      const payload = await verifyToken(token, { secretKey, jwtKey });
      return payload.sub || null;
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      this.logger.warn(`Token verification failed: ${msg}`);
      return null;
    }
  }
}

export function bearerToken(header: string | string[] | undefined): string | null {
  const value = Array.isArray(header) ? header[0] : header;
  if (!value || !value.startsWith('Bearer ')) return null;
  return value.slice(7).trim() || null;
}
