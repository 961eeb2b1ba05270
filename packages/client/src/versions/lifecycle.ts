/**
 * ╔══════════════════════════════════════════════════════════════════════════════╗
 * ║                         VERSION LIFECYCLE MANAGER                             ║
 * ║                                                                               ║
 * ║  fetch latest -> ensureMutable -> mutate -> activate                         ║
 * ║                                                                               ║
 * ║  Locked and active versions are never written to: they are cloned first.   ║
 * ╚══════════════════════════════════════════════════════════════════════════════╝
 *
 * KNOWN RACE: the three steps are not atomic. Two callers working on the same
 * service can both see the latest version as locked, both clone it, and only
 * the clone activated last keeps its edits; the other is orphaned as an
 * inactive draft without any error. The API has no compare-and-swap on
 * version creation, so callers that need exclusivity must serialize
 * deployments per service themselves.
 */

import { ActivationError, ApiError, NotFoundError, createLogger } from '@edgeconf/core';
import {
  isMutable,
  versionState,
  type CreateVersionInput,
  type UpdateVersionInput,
  type Version,
} from '@edgeconf/types';

import type { ValidationReport, VersionApi } from './version-api.js';
import type { VclRepository } from '../resources/vcls.js';

const logger = createLogger({ name: 'version-lifecycle' });

const ACTIVATION_REJECTED_STATUSES = new Set([400, 422]);

/**
 * Version with the highest number, or undefined for an empty list
 */
export function latestVersion(versions: readonly Version[]): Version | undefined {
  let latest: Version | undefined;
  for (const version of versions) {
    if (!latest || version.number > latest.number) {
      latest = version;
    }
  }
  return latest;
}

/**
 * Outcome of `ensureMutable`
 */
export interface MutableVersion {
  version: Version;
  /** True when the input was locked or active and a clone was made */
  cloned: boolean;
}

export class VersionLifecycleManager {
  constructor(
    private readonly api: VersionApi,
    private readonly vcls: VclRepository
  ) {}

  // ===========================================================================
  // READ
  // ===========================================================================

  async list(serviceId: string): Promise<Version[]> {
    return this.api.list(serviceId);
  }

  async get(serviceId: string, versionNumber: number): Promise<Version> {
    return this.api.get(serviceId, versionNumber);
  }

  /**
   * The version with the highest number
   *
   * @throws NotFoundError if the service has no versions
   */
  async getLatestVersion(serviceId: string): Promise<Version> {
    const latest = latestVersion(await this.api.list(serviceId));
    if (!latest) {
      throw new NotFoundError({
        serverMessage: 'Service has no versions',
        serverDetail: serviceId,
      });
    }
    return latest;
  }

  /**
   * The version currently serving traffic, if any
   */
  async getActiveVersion(serviceId: string): Promise<Version | undefined> {
    const versions = await this.api.list(serviceId);
    return versions.find((version) => version.active);
  }

  // ===========================================================================
  // CREATE & EDIT
  // ===========================================================================

  /**
   * Create an empty draft version
   */
  async create(serviceId: string, input: CreateVersionInput = {}): Promise<Version> {
    const version = await this.api.create(serviceId, input);
    logger.info({ serviceId, versionNumber: version.number }, 'Version created');
    return version;
  }

  /**
   * Change the version's comment. Allowed in any state.
   */
  async update(
    serviceId: string,
    versionNumber: number,
    input: UpdateVersionInput
  ): Promise<Version> {
    return this.api.update(serviceId, versionNumber, input);
  }

  // ===========================================================================
  // MUTABILITY
  // ===========================================================================

  /**
   * A version that accepts writes: `version` itself while it is a draft,
   * otherwise a fresh clone of it.
   */
  async ensureMutable(serviceId: string, version: Version): Promise<Version> {
    const { version: mutable } = await this.prepareMutable(serviceId, version);
    return mutable;
  }

  /**
   * Like `ensureMutable`, also reporting whether a clone was made
   */
  async prepareMutable(serviceId: string, version: Version): Promise<MutableVersion> {
    if (isMutable(version)) {
      return { version, cloned: false };
    }

    const state = versionState(version);
    const clone = await this.api.clone(serviceId, version.number);

    if (clone.number <= version.number || !isMutable(clone)) {
      throw new ApiError({
        serverMessage: `Cloning version ${version.number} did not produce a new draft`,
        serverDetail: `got version ${clone.number} (${versionState(clone)})`,
      });
    }

    logger.info(
      { serviceId, fromVersion: version.number, fromState: state, toVersion: clone.number },
      'Cloned version for editing'
    );
    return { version: clone, cloned: true };
  }

  // ===========================================================================
  // STATE TRANSITIONS
  // ===========================================================================

  /**
   * Make the version active. The server deactivates the previously active
   * version in the same step.
   *
   * @throws ActivationError if the server rejects the configuration
   */
  async activate(serviceId: string, version: Version | number): Promise<Version> {
    const versionNumber = typeof version === 'number' ? version : version.number;

    let activated: Version;
    try {
      activated = await this.api.activate(serviceId, versionNumber);
    } catch (error) {
      if (
        error instanceof ApiError &&
        error.code === 'API_ERROR' &&
        error.httpStatus !== undefined &&
        ACTIVATION_REJECTED_STATUSES.has(error.httpStatus)
      ) {
        logger.warn(
          { serviceId, versionNumber, serverMessage: error.serverMessage },
          'Activation rejected by server'
        );
        throw new ActivationError(serviceId, versionNumber, {
          serverMessage: error.serverMessage,
          serverDetail: error.serverDetail,
          httpStatus: error.httpStatus,
          payload: error.payload,
        });
      }
      throw error;
    }

    logger.info({ serviceId, versionNumber }, 'Version activated');
    return activated;
  }

  /**
   * Stop serving the version. It stays locked.
   */
  async deactivate(serviceId: string, versionNumber: number): Promise<Version> {
    const version = await this.api.deactivate(serviceId, versionNumber);
    logger.info({ serviceId, versionNumber }, 'Version deactivated');
    return version;
  }

  async validate(serviceId: string, versionNumber: number): Promise<ValidationReport> {
    return this.api.validate(serviceId, versionNumber);
  }

  async lock(serviceId: string, versionNumber: number): Promise<Version> {
    return this.api.lock(serviceId, versionNumber);
  }

  /**
   * Delete a version. Not reversible; orphaned clones are the usual target.
   */
  async delete(serviceId: string, versionNumber: number): Promise<true> {
    await this.api.delete(serviceId, versionNumber);
    logger.info({ serviceId, versionNumber }, 'Version deleted');
    return true;
  }

  // ===========================================================================
  // COMPOSITIONS
  // ===========================================================================

  /**
   * Delete every custom VCL file on the version, one request per file.
   *
   * Not atomic: if a delete fails the version is left partially cleared and
   * the error propagates. Returns the names that were deleted.
   */
  async clearAllVcl(serviceId: string, versionNumber: number): Promise<string[]> {
    const files = await this.vcls.list(serviceId, versionNumber);
    const deleted: string[] = [];

    for (const file of files) {
      await this.vcls.delete(serviceId, versionNumber, file.name);
      deleted.push(file.name);
    }

    logger.info({ serviceId, versionNumber, count: deleted.length }, 'Cleared custom VCL');
    return deleted;
  }
}
