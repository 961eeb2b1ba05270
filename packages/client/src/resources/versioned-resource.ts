import { DeletionError, createLogger } from '@edgeconf/core';
import { z } from 'zod';

import { encodeForm, versionPath } from '../form.js';
import type { FastlyTransport } from '../transport.js';

const logger = createLogger({ name: 'versioned-resource' });

/**
 * Wire description of one version-scoped configuration kind
 *
 * The create schema's keys are the closed allow-list of transmitted fields;
 * its defaults are what the client sends when the caller leaves a field out.
 */
export interface ResourceDefinition<
  TSchema extends z.ZodTypeAny,
  TCreate extends z.AnyZodObject,
  TUpdate extends z.AnyZodObject,
> {
  /** Path segment under `/service/{id}/version/{n}/` */
  segment: string;
  /** Human-readable kind, used in logs */
  label: string;
  schema: TSchema;
  createSchema: TCreate;
  updateSchema: TUpdate;
}

/**
 * Uniform CRUD for one configuration kind, scoped to (service, version)
 *
 * Holds no state besides the transport: entities are returned fresh on every
 * call and never cached, so staleness is always explicit at the call site.
 */
export class VersionedResource<
  TSchema extends z.ZodTypeAny,
  TCreate extends z.AnyZodObject,
  TUpdate extends z.AnyZodObject,
> {
  private readonly allowList: readonly string[];

  constructor(
    protected readonly transport: FastlyTransport,
    protected readonly definition: ResourceDefinition<TSchema, TCreate, TUpdate>
  ) {
    this.allowList = Object.keys(definition.createSchema.shape);
  }

  get kind(): string {
    return this.definition.label;
  }

  /**
   * All objects of this kind in the version; empty when there are none
   */
  async list(serviceId: string, versionNumber: number): Promise<z.output<TSchema>[]> {
    return this.transport.request(
      this.collectionPath(serviceId, versionNumber),
      z.array(this.definition.schema)
    );
  }

  /**
   * Create an object. A name already used in this version is a conflict.
   */
  async create(
    serviceId: string,
    versionNumber: number,
    input: z.input<TCreate>
  ): Promise<z.output<TSchema>> {
    const fields: Record<string, unknown> = this.definition.createSchema.parse(input);

    const created = await this.transport.request(
      this.collectionPath(serviceId, versionNumber),
      this.definition.schema,
      { method: 'POST', form: encodeForm(fields, this.allowList) }
    );

    logger.debug(
      { kind: this.definition.label, serviceId, versionNumber, name: fields.name },
      'Configuration object created'
    );
    return created;
  }

  async get(serviceId: string, versionNumber: number, name: string): Promise<z.output<TSchema>> {
    return this.transport.request(
      this.objectPath(serviceId, versionNumber, name),
      this.definition.schema
    );
  }

  /**
   * Partial update: fields left out keep their server-side values.
   * Passing `name` renames the object.
   */
  async update(
    serviceId: string,
    versionNumber: number,
    name: string,
    changes: z.input<TUpdate>
  ): Promise<z.output<TSchema>> {
    const fields: Record<string, unknown> = this.definition.updateSchema.parse(changes);

    return this.transport.request(
      this.objectPath(serviceId, versionNumber, name),
      this.definition.schema,
      { method: 'PUT', form: encodeForm(fields, this.allowList) }
    );
  }

  /**
   * Delete by name. A missing name raises `NotFoundError`.
   */
  async delete(serviceId: string, versionNumber: number, name: string): Promise<true> {
    await this.transport.requestStatus(
      this.objectPath(serviceId, versionNumber, name),
      { method: 'DELETE' },
      (options) => new DeletionError(options)
    );

    logger.debug(
      { kind: this.definition.label, serviceId, versionNumber, name },
      'Configuration object deleted'
    );
    return true;
  }

  protected collectionPath(serviceId: string, versionNumber: number): string {
    return versionPath(serviceId, versionNumber, this.definition.segment);
  }

  protected objectPath(serviceId: string, versionNumber: number, name: string): string {
    return versionPath(serviceId, versionNumber, this.definition.segment, name);
  }
}
