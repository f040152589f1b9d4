import { z } from 'zod';
import { assertFields, assertProvidedFields, NOT_BLANK } from '../validation.js';

const EMAIL_FORMAT = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

const idSchema = z
  .string()
  .regex(NOT_BLANK, 'user ID cannot be empty')
  .min(3, 'user ID must be at least 3 characters long')
  .max(50, 'user ID cannot exceed 50 characters');

const emailSchema = z
  .string()
  .regex(NOT_BLANK, 'email cannot be empty')
  .max(255, 'email cannot exceed 255 characters')
  .regex(EMAIL_FORMAT, 'invalid email format');

const nameSchema = z
  .string()
  .regex(NOT_BLANK, 'name cannot be empty')
  .min(2, 'name must be at least 2 characters long')
  .max(100, 'name cannot exceed 100 characters');

export interface CreateUserInput {
  id: string;
  email: string;
  name: string;
}

export interface UserChanges {
  email?: string;
  name?: string;
}

/**
 * Field-level checks for user input. Stateless; never touches a store.
 * Fields are checked in the order id, email, name.
 */
export class UserValidator {
  validateCreate(input: CreateUserInput): void {
    assertFields([
      { field: 'id', schema: idSchema, value: input.id },
      { field: 'email', schema: emailSchema, value: input.email },
      { field: 'name', schema: nameSchema, value: input.name },
    ]);
  }

  validateUpdate(id: string, changes: UserChanges): void {
    assertFields([{ field: 'id', schema: idSchema, value: id }]);
    assertProvidedFields([
      { field: 'email', schema: emailSchema, value: changes.email },
      { field: 'name', schema: nameSchema, value: changes.name },
    ]);
  }
}
