/**
 * Entity Identity Service
 *
 * Maps a host entity to the stable ID used as its graph node key. The ID is a
 * pure function of the host's persistent token, so the same entity reached
 * through different reference paths, or extracted in another run, always
 * maps to the same node.
 */

import * as crypto from 'crypto';
import type { HostEntity } from '../host/types.js';
import { HostUnavailableError, IdentityUnavailableError, errorMessage } from '../errors.js';

const STABLE_ID_PREFIX = 'cad-';

/**
 * Stable ID for a persistent token: 'cad-' + 32 hex chars of SHA-256.
 */
export function stableIdForToken(token: string): string {
  const digest = crypto.createHash('sha256').update(token, 'utf8').digest('hex');
  return `${STABLE_ID_PREFIX}${digest.slice(0, 32)}`;
}

export class IdentityService {
  private cache = new Map<string, string>();

  /**
   * @throws IdentityUnavailableError if the host has no token for the entity
   * @throws HostUnavailableError if the document is gone
   */
  identityOf(entity: HostEntity): string {
    const token = this.readToken(entity);

    const cached = this.cache.get(token);
    if (cached !== undefined) return cached;

    const stableId = stableIdForToken(token);
    this.cache.set(token, stableId);
    return stableId;
  }

  /**
   * Same as identityOf, but undefined for entities without a token.
   * Used for optional references.
   */
  tryIdentityOf(entity: HostEntity | undefined): string | undefined {
    if (!entity) return undefined;
    try {
      return this.identityOf(entity);
    } catch (error) {
      if (error instanceof IdentityUnavailableError) return undefined;
      throw error;
    }
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  /** Drop cached IDs (between runs) */
  reset(): void {
    this.cache.clear();
  }

  private readToken(entity: HostEntity): string {
    let token: string | undefined;
    try {
      token = entity.entityToken;
    } catch (error) {
      if (error instanceof HostUnavailableError) throw error;
      throw new IdentityUnavailableError(entity.objectType, errorMessage(error), { cause: error });
    }

    if (token === undefined || token === '') {
      throw new IdentityUnavailableError(entity.objectType, 'host returned no entity token');
    }
    return token;
  }
}
