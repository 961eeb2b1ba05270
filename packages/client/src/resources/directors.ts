import { DeletionError } from '@edgeconf/core';
import {
  DirectorBackendSchema,
  type CreateDirectorInputSchema,
  type DirectorBackend,
  type DirectorSchema,
  type UpdateDirectorInputSchema,
} from '@edgeconf/types';

import { directorDefinition } from './definitions.js';
import { VersionedResource } from './versioned-resource.js';
import type { FastlyTransport } from '../transport.js';

/**
 * Load-balancing groups of backends
 *
 * Membership is an association, not ownership: a backend can sit in several
 * directors, but a given (director, backend) pair exists at most once.
 */
export class DirectorRepository extends VersionedResource<
  typeof DirectorSchema,
  typeof CreateDirectorInputSchema,
  typeof UpdateDirectorInputSchema
> {
  constructor(transport: FastlyTransport) {
    super(transport, directorDefinition);
  }

  /**
   * The membership record, or `NotFoundError` if the backend is not a member
   */
  async getBackend(
    serviceId: string,
    versionNumber: number,
    directorName: string,
    backendName: string
  ): Promise<DirectorBackend> {
    return this.transport.request(
      this.membershipPath(serviceId, versionNumber, directorName, backendName),
      DirectorBackendSchema
    );
  }

  /**
   * Add a backend to the director. Adding it twice is a conflict.
   */
  async addBackend(
    serviceId: string,
    versionNumber: number,
    directorName: string,
    backendName: string
  ): Promise<DirectorBackend> {
    return this.transport.request(
      this.membershipPath(serviceId, versionNumber, directorName, backendName),
      DirectorBackendSchema,
      { method: 'POST' }
    );
  }

  async removeBackend(
    serviceId: string,
    versionNumber: number,
    directorName: string,
    backendName: string
  ): Promise<true> {
    return this.transport.requestStatus(
      this.membershipPath(serviceId, versionNumber, directorName, backendName),
      { method: 'DELETE' },
      (options) => new DeletionError(options)
    );
  }

  private membershipPath(
    serviceId: string,
    versionNumber: number,
    directorName: string,
    backendName: string
  ): string {
    const directorPath = this.objectPath(serviceId, versionNumber, directorName);
    return `${directorPath}/backend/${encodeURIComponent(backendName)}`;
  }
}
