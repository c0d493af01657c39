/**
 * Password hashing (bcryptjs) and strength rules.
 */

import bcrypt from 'bcryptjs';
import { config } from '../../config/environment';
import { ErrorCode, ValidationError } from '../types/error.types';

export const MIN_PASSWORD_LENGTH = 8;

export interface PasswordOwner {
  email: string;
  name: string;
}

/**
 * Every rule the password breaks, empty when it is acceptable
 */
export function passwordProblems(password: string, owner: PasswordOwner): string[] {
  const problems: string[] = [];
  const lowered = password.toLowerCase();
  const localPart = owner.email.split('@')[0].toLowerCase();
  const name = owner.name.trim().toLowerCase();

  if (localPart && lowered === localPart) {
    problems.push('The password is too similar to the email.');
  } else if (name && lowered === name) {
    problems.push('The password is too similar to the name.');
  }
  if (password.length < MIN_PASSWORD_LENGTH) {
    problems.push(`This password is too short. It must contain at least ${MIN_PASSWORD_LENGTH} characters.`);
  }
  if (/^\d+$/.test(password)) {
    problems.push('This password is entirely numeric.');
  }
  return problems;
}

export function assertStrongPassword(password: string, owner: PasswordOwner, field: string = 'password'): void {
  const problems = passwordProblems(password, owner);
  if (problems.length > 0) {
    throw new ValidationError(
      'Password is too weak',
      problems.map(message => ({ field, message })),
      ErrorCode.WEAK_PASSWORD
    );
  }
}

export function hashPassword(password: string): Promise<string> {
  return bcrypt.hash(password, config.security.bcryptRounds);
}

export function verifyPassword(password: string, hash: string): Promise<boolean> {
  return bcrypt.compare(password, hash);
}
