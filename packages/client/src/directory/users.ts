import { DeletionError, createLogger } from '@edgeconf/core';
import {
  CreateUserInputSchema,
  UpdateUserInputSchema,
  UserSchema,
  type CreateUserInput,
  type UpdateUserInput,
  type User,
} from '@edgeconf/types';
import { z } from 'zod';

import { apiPath, encodeForm } from '../form.js';
import type { FastlyTransport } from '../transport.js';

const logger = createLogger({ name: 'user-directory' });

const CREATE_USER_FIELDS = Object.keys(CreateUserInputSchema.shape);
const UPDATE_USER_FIELDS = Object.keys(UpdateUserInputSchema.shape);

const ChangePasswordInputSchema = z.object({
  old_password: z.string().min(1),
  password: z.string().min(1),
});

/**
 * Users of a customer account. Requires a session login.
 */
export class UserDirectory {
  constructor(private readonly transport: FastlyTransport) {}

  async getCurrent(): Promise<User> {
    return this.transport.request('/current_user', UserSchema);
  }

  async get(userId: string): Promise<User> {
    return this.transport.request(apiPath('user', userId), UserSchema);
  }

  async create(input: CreateUserInput): Promise<User> {
    const fields = CreateUserInputSchema.parse(input);
    const user = await this.transport.request('/user', UserSchema, {
      method: 'POST',
      form: encodeForm(fields, CREATE_USER_FIELDS),
    });
    logger.info({ userId: user.id, role: fields.role }, 'User created');
    return user;
  }

  async update(userId: string, changes: UpdateUserInput): Promise<User> {
    const fields = UpdateUserInputSchema.parse(changes);
    return this.transport.request(apiPath('user', userId), UserSchema, {
      method: 'PUT',
      form: encodeForm(fields, UPDATE_USER_FIELDS),
    });
  }

  async delete(userId: string): Promise<true> {
    return this.transport.requestStatus(
      apiPath('user', userId),
      { method: 'DELETE' },
      (options) => new DeletionError(options)
    );
  }

  /**
   * Change the logged-in user's password
   */
  async changePassword(oldPassword: string, newPassword: string): Promise<User> {
    const fields = ChangePasswordInputSchema.parse({
      old_password: oldPassword,
      password: newPassword,
    });
    return this.transport.request('/current_user/password', UserSchema, {
      method: 'POST',
      form: encodeForm(fields, ['old_password', 'password']),
    });
  }

  /**
   * Email the user a password reset link
   */
  async requestPasswordReset(userId: string): Promise<true> {
    return this.transport.requestStatus(apiPath('user', userId, 'password', 'request_reset'), {
      method: 'POST',
    });
  }
}
