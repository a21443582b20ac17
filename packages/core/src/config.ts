import Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
import engineSchemas from '../schemas/engine.schema.json';
import { ConfigurationError } from './errors';
import type { OutcomeMap } from './types';

/** Names of the JSON schemas shipped with the engine. */
export type ConfigSchemaName = keyof typeof engineSchemas;

/** Multiplier one side's wins must exceed to dominate a pairing. */
export const DEFAULT_DOMINANCE_FACTOR = 1.5;

/** Event categories, seen from the first participant, that decide a matchup. */
export const DEFAULT_OUTCOMES: OutcomeMap = { win: 'win', loss: 'loss', draw: 'draw' };

let ajvInstance: Ajv | null = null;

function getAjv(): Ajv {
  if (ajvInstance) {
    return ajvInstance;
  }
  const ajv = new Ajv({ allErrors: true, strict: false });
  for (const [name, schema] of Object.entries(engineSchemas)) {
    ajv.addSchema(schema, name);
  }
  ajvInstance = ajv;
  return ajv;
}

function formatProblems(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors || errors.length === 0) {
    return ['does not match schema'];
  }
  return errors.map((error) => `${error.instancePath || '/'} ${error.message ?? 'is invalid'}`);
}

function getValidator<T>(name: ConfigSchemaName): ValidateFunction<T> {
  const validate = getAjv().getSchema<T>(name);
  if (!validate) {
    throw new Error(`Schema ${name} is not registered`);
  }
  if ('$async' in validate) {
    throw new Error(`Schema ${name} is asynchronous`);
  }
  return validate;
}

/**
 * Check already-typed options against their schema and hand them back.
 * Catches values the type system cannot (negative thresholds, empty domains).
 *
 * @throws ConfigurationError when the options do not match
 */
export function checkConfig<T>(name: ConfigSchemaName, value: T): T {
  const validate = getValidator<T>(name);
  if (!validate(value)) {
    throw new ConfigurationError(name, formatProblems(validate.errors));
  }
  return value;
}

/**
 * Parse untyped configuration, such as a label table read from JSON.
 *
 * @throws ConfigurationError when the value does not match
 */
export function parseConfig<T>(name: ConfigSchemaName, raw: unknown): T {
  const validate = getValidator<T>(name);
  if (validate(raw)) {
    return raw;
  }
  throw new ConfigurationError(name, formatProblems(validate.errors));
}

/** Drop the cached validator instance (mainly for testing). */
export function resetConfigCache(): void {
  ajvInstance = null;
}
