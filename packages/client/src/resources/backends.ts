import {
  BackendCheckSchema,
  type BackendCheck,
  type BackendSchema,
  type CreateBackendInputSchema,
  type UpdateBackendInputSchema,
} from '@edgeconf/types';
import { z } from 'zod';

import { backendDefinition } from './definitions.js';
import { VersionedResource } from './versioned-resource.js';
import { versionPath } from '../form.js';
import type { FastlyTransport } from '../transport.js';

/**
 * Origin servers the edge fetches content from
 */
export class BackendRepository extends VersionedResource<
  typeof BackendSchema,
  typeof CreateBackendInputSchema,
  typeof UpdateBackendInputSchema
> {
  constructor(transport: FastlyTransport) {
    super(transport, backendDefinition);
  }

  /**
   * Probe every backend of the version and report what each one answered
   */
  async checkAll(serviceId: string, versionNumber: number): Promise<BackendCheck[]> {
    return this.transport.request(
      versionPath(serviceId, versionNumber, 'backend', 'check_all'),
      z.array(BackendCheckSchema)
    );
  }
}
