import { DeletionError, NotFoundError } from '@edgeconf/core';
import {
  CreateServiceInputSchema,
  DomainSchema,
  ServiceSchema,
  UpdateServiceInputSchema,
  type CreateServiceInput,
  type Domain,
  type Service,
  type UpdateServiceInput,
} from '@edgeconf/types';
import { z } from 'zod';

import { apiPath, encodeForm } from '../form.js';
import type { FastlyTransport } from '../transport.js';

const SERVICE_FIELDS = ['customer_id', 'name', 'publish_key', 'comment'] as const;

/**
 * Services: the configuration roots that own versions
 */
export class ServiceDirectory {
  constructor(private readonly transport: FastlyTransport) {}

  async list(): Promise<Service[]> {
    return this.transport.request('/service', z.array(ServiceSchema));
  }

  async get(serviceId: string): Promise<Service> {
    return this.transport.request(apiPath('service', serviceId), ServiceSchema);
  }

  /**
   * Service with its full version list
   */
  async getDetails(serviceId: string): Promise<Service> {
    return this.transport.request(apiPath('service', serviceId, 'details'), ServiceSchema);
  }

  /**
   * Look a service up by its exact name
   *
   * @throws NotFoundError if no service has that name
   */
  async getByName(name: string): Promise<Service> {
    const service = await this.transport.request(
      `/service/search?name=${encodeURIComponent(name)}`,
      ServiceSchema.nullable()
    );
    if (!service) {
      throw new NotFoundError({ serverMessage: 'Service not found', serverDetail: name });
    }
    return service;
  }

  async create(input: CreateServiceInput): Promise<Service> {
    const fields = CreateServiceInputSchema.parse(input);
    return this.transport.request('/service', ServiceSchema, {
      method: 'POST',
      form: encodeForm(fields, SERVICE_FIELDS),
    });
  }

  async update(serviceId: string, changes: UpdateServiceInput): Promise<Service> {
    const fields = UpdateServiceInputSchema.parse(changes);
    return this.transport.request(apiPath('service', serviceId), ServiceSchema, {
      method: 'PUT',
      form: encodeForm(fields, SERVICE_FIELDS),
    });
  }

  async delete(serviceId: string): Promise<true> {
    return this.transport.requestStatus(
      apiPath('service', serviceId),
      { method: 'DELETE' },
      (options) => new DeletionError(options)
    );
  }

  /**
   * Domains across every version of the service
   */
  async listDomains(serviceId: string): Promise<Domain[]> {
    return this.transport.request(apiPath('service', serviceId, 'domain'), z.array(DomainSchema));
  }
}
