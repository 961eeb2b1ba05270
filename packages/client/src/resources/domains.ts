import {
  DomainCheckSchema,
  type CreateDomainInputSchema,
  type DomainCheck,
  type DomainSchema,
  type UpdateDomainInputSchema,
} from '@edgeconf/types';
import { z } from 'zod';

import { domainDefinition } from './definitions.js';
import { VersionedResource } from './versioned-resource.js';
import type { FastlyTransport } from '../transport.js';

export class DomainRepository extends VersionedResource<
  typeof DomainSchema,
  typeof CreateDomainInputSchema,
  typeof UpdateDomainInputSchema
> {
  constructor(transport: FastlyTransport) {
    super(transport, domainDefinition);
  }

  /**
   * Check the DNS CNAME of one domain
   */
  async check(serviceId: string, versionNumber: number, name: string): Promise<DomainCheck> {
    return this.transport.request(
      `${this.objectPath(serviceId, versionNumber, name)}/check`,
      DomainCheckSchema
    );
  }

  async checkAll(serviceId: string, versionNumber: number): Promise<DomainCheck[]> {
    return this.transport.request(
      `${this.collectionPath(serviceId, versionNumber)}/check_all`,
      z.array(DomainCheckSchema)
    );
  }
}
