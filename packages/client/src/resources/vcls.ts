import {
  GeneratedVclSchema,
  VclContentSchema,
  type CreateVclInputSchema,
  type GeneratedVcl,
  type UpdateVclInputSchema,
  type Vcl,
  type VclSchema,
} from '@edgeconf/types';

import { vclDefinition } from './definitions.js';
import { VersionedResource } from './versioned-resource.js';
import { versionPath } from '../form.js';
import type { FastlyTransport } from '../transport.js';

export interface GetVclOptions {
  /** Include the VCL source in the response (default true) */
  includeContent?: boolean;
}

/**
 * Custom VCL files. At most one per version is the main file; the others
 * are only reachable through `include` statements.
 */
export class VclRepository extends VersionedResource<
  typeof VclSchema,
  typeof CreateVclInputSchema,
  typeof UpdateVclInputSchema
> {
  constructor(transport: FastlyTransport) {
    super(transport, vclDefinition);
  }

  override async get(
    serviceId: string,
    versionNumber: number,
    name: string,
    options: GetVclOptions = {}
  ): Promise<Vcl> {
    const includeContent = (options.includeContent ?? true) ? 1 : 0;
    return this.transport.request(
      `${this.objectPath(serviceId, versionNumber, name)}?include_content=${includeContent}`,
      vclDefinition.schema
    );
  }

  /**
   * Make `name` the version's main VCL
   */
  async setMain(serviceId: string, versionNumber: number, name: string): Promise<Vcl> {
    return this.transport.request(
      `${this.objectPath(serviceId, versionNumber, name)}/main`,
      vclDefinition.schema,
      { method: 'PUT' }
    );
  }

  /**
   * The file's source as syntax-highlighted HTML
   */
  async getContent(
    serviceId: string,
    versionNumber: number,
    name: string
  ): Promise<string | undefined> {
    const { content } = await this.transport.request(
      `${this.objectPath(serviceId, versionNumber, name)}/content`,
      VclContentSchema
    );
    return content;
  }

  /**
   * The VCL the server generated from the version's configuration objects
   */
  async getGenerated(serviceId: string, versionNumber: number): Promise<GeneratedVcl> {
    return this.transport.request(
      versionPath(serviceId, versionNumber, 'generated_vcl'),
      GeneratedVclSchema
    );
  }

  /**
   * The generated VCL as syntax-highlighted HTML
   */
  async getGeneratedContent(
    serviceId: string,
    versionNumber: number
  ): Promise<string | undefined> {
    const { content } = await this.transport.request(
      versionPath(serviceId, versionNumber, 'generated_vcl', 'content'),
      VclContentSchema
    );
    return content;
  }
}
