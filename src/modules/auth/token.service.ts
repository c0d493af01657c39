/**
 * =============================================================================
 * AUTH MODULE - TOKEN SERVICE
 * =============================================================================
 *
 * JWT access/refresh pairs.
 *
 * - Access:  { userId, email, isStaff, type: 'access' }, JWT_SECRET, short-lived
 * - Refresh: { userId, jti, type: 'refresh' }, JWT_REFRESH_SECRET
 *
 * Logout blacklists one refresh jti. Logout-all stamps tokensRevokedAt on
 * the user; refresh tokens issued before that second are rejected.
 * =============================================================================
 */

import jwt from 'jsonwebtoken';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { config } from '../../config/environment';
import { getStore } from '../../shared/database/db';
import type { User } from '../../shared/database/entities';
import { logger } from '../../shared/services/logger.service';
import { AuthenticationError, ErrorCode } from '../../shared/types/error.types';

export interface TokenPair {
  access: string;
  refresh: string;
}

const refreshClaimsSchema = z.object({
  userId: z.number().int().positive(),
  jti: z.string().min(1),
  type: z.literal('refresh'),
  iat: z.number(),
  exp: z.number()
});

export type RefreshClaims = z.infer<typeof refreshClaimsSchema>;

/**
 * "15m" -> 900. Plain numbers are seconds.
 */
export function getExpirySeconds(duration: string): number {
  const match = duration.trim().match(/^(\d+)([dhms]?)$/);
  if (!match) return 3600;

  const value = parseInt(match[1], 10);
  switch (match[2]) {
    case 'd': return value * 24 * 60 * 60;
    case 'h': return value * 60 * 60;
    case 'm': return value * 60;
    default: return value;
  }
}

class TokenService {
  issueAccess(user: User): string {
    return jwt.sign(
      { userId: user.id, email: user.email, isStaff: user.isStaff, type: 'access' },
      config.jwt.secret,
      { expiresIn: getExpirySeconds(config.jwt.expiresIn) }
    );
  }

  issueRefresh(user: User): string {
    return jwt.sign(
      { userId: user.id, jti: uuidv4(), type: 'refresh' },
      config.jwt.refreshSecret,
      { expiresIn: getExpirySeconds(config.jwt.refreshExpiresIn) }
    );
  }

  issuePair(user: User): TokenPair {
    return { access: this.issueAccess(user), refresh: this.issueRefresh(user) };
  }

  /**
   * Signature, expiry and claim shape only
   */
  decodeRefresh(token: string): RefreshClaims {
    let decoded: unknown;
    try {
      decoded = jwt.verify(token, config.jwt.refreshSecret);
    } catch {
      throw new AuthenticationError('Invalid or expired refresh token', ErrorCode.INVALID_TOKEN);
    }

    const claims = refreshClaimsSchema.safeParse(decoded);
    if (!claims.success) {
      throw new AuthenticationError('Invalid or expired refresh token', ErrorCode.INVALID_TOKEN);
    }
    return claims.data;
  }

  /**
   * Exchange a live refresh token for a new access token
   */
  async refresh(token: string): Promise<{ access: string }> {
    const claims = this.decodeRefresh(token);
    const repos = getStore().repos;

    if (await repos.tokens.isRevoked(claims.jti)) {
      throw new AuthenticationError('Refresh token has been revoked', ErrorCode.TOKEN_REVOKED);
    }

    const user = await repos.users.findById(claims.userId);
    if (!user || !user.isActive) {
      throw new AuthenticationError('Invalid or expired refresh token', ErrorCode.INVALID_TOKEN);
    }

    // iat has whole-second precision: a token from the revocation second is revoked too
    if (user.tokensRevokedAt && claims.iat <= Math.floor(user.tokensRevokedAt.getTime() / 1000)) {
      throw new AuthenticationError('Refresh token has been revoked', ErrorCode.TOKEN_REVOKED);
    }

    return { access: this.issueAccess(user) };
  }

  /**
   * Blacklist one refresh token. It must belong to `userId`.
   */
  async revoke(token: string, userId: number): Promise<void> {
    const claims = this.decodeRefresh(token);
    if (claims.userId !== userId) {
      throw new AuthenticationError('Invalid or expired refresh token', ErrorCode.INVALID_TOKEN);
    }

    const tokens = getStore().repos.tokens;
    if (await tokens.isRevoked(claims.jti)) {
      throw new AuthenticationError('Refresh token has been revoked', ErrorCode.TOKEN_REVOKED);
    }

    await tokens.revoke({ jti: claims.jti, userId, expiresAt: new Date(claims.exp * 1000) });
    logger.info('Refresh token revoked', { userId });
  }

  async revokeAll(userId: number): Promise<void> {
    await getStore().repos.users.update(userId, { tokensRevokedAt: new Date() });
    logger.info('All refresh tokens revoked', { userId });
  }
}

export const tokenService = new TokenService();
