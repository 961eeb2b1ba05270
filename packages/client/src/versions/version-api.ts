import { DeletionError, ValidationError } from '@edgeconf/core';
import {
  CreateVersionInputSchema,
  UpdateVersionInputSchema,
  VersionSchema,
  VersionValidationSchema,
  type CreateVersionInput,
  type UpdateVersionInput,
  type Version,
} from '@edgeconf/types';
import { z } from 'zod';

import { apiPath, encodeForm, versionPath } from '../form.js';
import type { FastlyTransport } from '../transport.js';

export interface ValidationReport {
  valid: true;
  warnings: string[];
}

/**
 * Raw version endpoints. These do not check lifecycle state; the
 * lifecycle manager layers the clone-before-mutate rule on top.
 */
export class VersionApi {
  constructor(private readonly transport: FastlyTransport) {}

  async list(serviceId: string): Promise<Version[]> {
    return this.transport.request(apiPath('service', serviceId, 'version'), z.array(VersionSchema));
  }

  async get(serviceId: string, versionNumber: number): Promise<Version> {
    return this.transport.request(versionPath(serviceId, versionNumber), VersionSchema);
  }

  /**
   * Create an empty version
   */
  async create(serviceId: string, input: CreateVersionInput = {}): Promise<Version> {
    const fields = CreateVersionInputSchema.parse(input);
    return this.transport.request(apiPath('service', serviceId, 'version'), VersionSchema, {
      method: 'POST',
      form: encodeForm(fields, ['inherit_service_id', 'comment']),
    });
  }

  async update(
    serviceId: string,
    versionNumber: number,
    input: UpdateVersionInput
  ): Promise<Version> {
    const fields = UpdateVersionInputSchema.parse(input);
    return this.transport.request(versionPath(serviceId, versionNumber), VersionSchema, {
      method: 'PUT',
      form: encodeForm(fields, ['comment']),
    });
  }

  /**
   * New draft version inheriting the configuration of `versionNumber`
   */
  async clone(serviceId: string, versionNumber: number): Promise<Version> {
    return this.transport.request(versionPath(serviceId, versionNumber, 'clone'), VersionSchema, {
      method: 'PUT',
    });
  }

  async activate(serviceId: string, versionNumber: number): Promise<Version> {
    return this.transport.request(
      versionPath(serviceId, versionNumber, 'activate'),
      VersionSchema,
      { method: 'PUT' }
    );
  }

  async deactivate(serviceId: string, versionNumber: number): Promise<Version> {
    return this.transport.request(
      versionPath(serviceId, versionNumber, 'deactivate'),
      VersionSchema,
      { method: 'PUT' }
    );
  }

  /**
   * Server-side validation of the version's configuration
   *
   * @throws ValidationError carrying the server's error list
   */
  async validate(serviceId: string, versionNumber: number): Promise<ValidationReport> {
    const result = await this.transport.request(
      versionPath(serviceId, versionNumber, 'validate'),
      VersionValidationSchema,
      { allowFailureStatus: true }
    );

    if (result.status !== 'ok') {
      throw new ValidationError(
        {
          serverMessage: result.msg ?? `Version ${versionNumber} failed validation`,
          serverDetail: result.detail ?? (result.errors.join('; ') || undefined),
          payload: { status: result.status, msg: result.msg, detail: result.detail },
        },
        result.errors
      );
    }

    return { valid: true, warnings: result.warnings };
  }

  /**
   * Lock a draft so it can no longer be edited. Requires a session login.
   */
  async lock(serviceId: string, versionNumber: number): Promise<Version> {
    return this.transport.request(versionPath(serviceId, versionNumber, 'lock'), VersionSchema, {
      method: 'PUT',
    });
  }

  async delete(serviceId: string, versionNumber: number): Promise<true> {
    return this.transport.requestStatus(
      versionPath(serviceId, versionNumber),
      { method: 'DELETE' },
      (options) => new DeletionError(options)
    );
  }
}
