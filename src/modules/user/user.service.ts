/**
 * =============================================================================
 * USER MODULE - SERVICE
 * =============================================================================
 *
 * Email-keyed user lookups shared by the location, address, cart and
 * order modules. Emails arrive already trimmed and lower-cased by
 * emailSchema.
 * =============================================================================
 */

import { getStore } from '../../shared/database/db';
import type { User } from '../../shared/database/entities';
import { ErrorCode, NotFoundError, ValidationError } from '../../shared/types/error.types';

class UserService {
  async findByEmail(email: string): Promise<User | null> {
    return getStore().repos.users.findByEmail(email.trim().toLowerCase());
  }

  /**
   * 404 USER_NOT_FOUND for an unknown email
   */
  async requireByEmail(email: string): Promise<User> {
    const user = await this.findByEmail(email);
    if (!user) {
      throw new NotFoundError('User', ErrorCode.USER_NOT_FOUND);
    }
    return user;
  }

  /**
   * Same lookup for form-style auth endpoints: a 400 on the email field
   */
  async requireForForm(email: string): Promise<User> {
    const user = await this.findByEmail(email);
    if (!user) {
      throw ValidationError.forField('email', 'User not found.', ErrorCode.USER_NOT_FOUND);
    }
    return user;
  }

  async getById(userId: number): Promise<User> {
    const user = await getStore().repos.users.findById(userId);
    if (!user) {
      throw new NotFoundError('User', ErrorCode.USER_NOT_FOUND);
    }
    return user;
  }
}

export const userService = new UserService();
