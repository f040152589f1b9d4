import type { ZodTypeAny } from 'zod';
import { ValidationError } from '../domain/errors.js';

export interface FieldRule {
  field: string;
  schema: ZodTypeAny;
  value: unknown;
}

/**
 * Checks each rule in order and throws a ValidationError carrying the first
 * failing rule's message. Zod reports a schema's checks in declaration order,
 * so the first issue is the first rule that failed.
 */
export function assertFields(rules: readonly FieldRule[]): void {
  for (const rule of rules) {
    const result = rule.schema.safeParse(rule.value);
    if (!result.success) {
      const issue = result.error.issues[0];
      throw new ValidationError(rule.field, issue?.message ?? `${rule.field} is invalid`);
    }
  }
}

/**
 * Same as assertFields, skipping fields the caller did not provide.
 */
export function assertProvidedFields(rules: readonly FieldRule[]): void {
  assertFields(rules.filter((rule) => rule.value !== undefined));
}

/** Rejects strings that are empty once whitespace is trimmed. */
export const NOT_BLANK = /\S/;
