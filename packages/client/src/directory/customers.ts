import { DeletionError } from '@edgeconf/core';
import {
  CustomerDetailsSchema,
  CustomerSchema,
  UpdateCustomerInputSchema,
  UserSchema,
  type Customer,
  type CustomerDetails,
  type UpdateCustomerInput,
  type User,
} from '@edgeconf/types';
import { z } from 'zod';

import { apiPath, encodeForm } from '../form.js';
import type { FastlyTransport } from '../transport.js';

const CUSTOMER_FIELDS = Object.keys(UpdateCustomerInputSchema.shape);

/**
 * Customer accounts. Most of these endpoints need a session login.
 */
export class CustomerDirectory {
  constructor(private readonly transport: FastlyTransport) {}

  /**
   * The customer the current credentials belong to
   */
  async getCurrent(): Promise<Customer> {
    return this.transport.request('/current_customer', CustomerSchema);
  }

  async get(customerId: string): Promise<Customer> {
    return this.transport.request(apiPath('customer', customerId), CustomerSchema);
  }

  /**
   * Customer with its owner and billing contact
   */
  async getDetails(customerId: string): Promise<CustomerDetails> {
    return this.transport.request(
      apiPath('customer', 'details', customerId),
      CustomerDetailsSchema
    );
  }

  async listUsers(customerId: string): Promise<User[]> {
    return this.transport.request(apiPath('customer', 'users', customerId), z.array(UserSchema));
  }

  async update(customerId: string, changes: UpdateCustomerInput): Promise<Customer> {
    const fields = UpdateCustomerInputSchema.parse(changes);
    return this.transport.request(apiPath('customer', customerId), CustomerSchema, {
      method: 'PUT',
      form: encodeForm(fields, CUSTOMER_FIELDS),
    });
  }

  async delete(customerId: string): Promise<true> {
    return this.transport.requestStatus(
      apiPath('customer', customerId),
      { method: 'DELETE' },
      (options) => new DeletionError(options)
    );
  }
}
