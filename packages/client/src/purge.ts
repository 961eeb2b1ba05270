import { createLogger } from '@edgeconf/core';
import {
  PurgeResultSchema,
  PurgeStatusSchema,
  SurrogateKeySchema,
  type PurgeResult,
  type PurgeStatus,
} from '@edgeconf/types';
import { z } from 'zod';

import { apiPath } from './form.js';
import type { FastlyTransport } from './transport.js';

const logger = createLogger({ name: 'purge' });

/**
 * Cache invalidation. Purges act on cached content, never on versions.
 */
export class PurgeController {
  constructor(private readonly transport: FastlyTransport) {}

  /**
   * Invalidate one exact URL
   *
   * @param host - Hostname the content is served under
   * @param path - Absolute path of the object, e.g. "/img/logo.png"
   */
  async purgeUrl(host: string, path: string): Promise<PurgeResult> {
    const result = await this.transport.request(path, PurgeResultSchema, {
      method: 'PURGE',
      headers: { Host: host },
    });
    logger.info({ host, path, purgeId: result.id }, 'URL purged');
    return result;
  }

  /**
   * Invalidate everything tagged with `key` on the service
   */
  async purgeKey(serviceId: string, key: string): Promise<true> {
    const surrogateKey = SurrogateKeySchema.parse(key);
    await this.transport.requestStatus(apiPath('service', serviceId, 'purge', surrogateKey), {
      method: 'POST',
    });
    logger.info({ serviceId, key: surrogateKey }, 'Surrogate key purged');
    return true;
  }

  /**
   * Invalidate everything cached for the service
   */
  async purgeService(serviceId: string): Promise<true> {
    await this.transport.requestStatus(apiPath('service', serviceId, 'purge_all'), {
      method: 'POST',
    });
    logger.info({ serviceId }, 'Service purged');
    return true;
  }

  /**
   * Servers that have applied the purge so far. Propagation is eventually
   * consistent: a short list means "still propagating", not failure. There
   * is no built-in polling; callers loop with their own backoff.
   */
  async checkPurgeStatus(purgeId: string): Promise<PurgeStatus[]> {
    return this.transport.request(
      `/purge?id=${encodeURIComponent(purgeId)}`,
      z.array(PurgeStatusSchema)
    );
  }
}
