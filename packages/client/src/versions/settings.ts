import {
  UpdateVersionSettingsInputSchema,
  VersionSettingsSchema,
  type UpdateVersionSettingsInput,
  type VersionSettings,
} from '@edgeconf/types';

import { encodeForm, versionPath } from '../form.js';
import type { FastlyTransport } from '../transport.js';

const SETTINGS_FIELDS = ['general.default_ttl', 'general.default_host'] as const;

/**
 * Version-wide settings: default TTL and default host
 */
export class VersionSettingsRepository {
  constructor(private readonly transport: FastlyTransport) {}

  async get(serviceId: string, versionNumber: number): Promise<VersionSettings> {
    return this.transport.request(
      versionPath(serviceId, versionNumber, 'settings'),
      VersionSettingsSchema
    );
  }

  async update(
    serviceId: string,
    versionNumber: number,
    changes: UpdateVersionSettingsInput
  ): Promise<VersionSettings> {
    const fields = UpdateVersionSettingsInputSchema.parse(changes);
    return this.transport.request(
      versionPath(serviceId, versionNumber, 'settings'),
      VersionSettingsSchema,
      { method: 'PUT', form: encodeForm(fields, SETTINGS_FIELDS) }
    );
  }
}
