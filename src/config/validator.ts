/**
 * Configuration validation
 * Checks a configuration against a JSON schema and reports each problem by path
 */

import Ajv, { type ErrorObject, type SchemaObject } from 'ajv';

export type ConfigSchema = SchemaObject;

export interface ValidationError {
  /** Dot-notation path of the offending value ('' for the root) */
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

const ajv = new Ajv({ allErrors: true });

function toValidationError(error: ErrorObject): ValidationError {
  const path = error.instancePath.split('/').filter(Boolean).join('.');
  if (error.keyword === 'required' && typeof error.params.missingProperty === 'string') {
    const missing = error.params.missingProperty;
    return {
      path: path ? `${path}.${missing}` : missing,
      message: 'is required',
    };
  }
  return {
    path,
    message: error.message ?? `failed ${error.keyword} check`,
  };
}

/**
 * Validate a configuration object against a JSON schema
 */
export function validateConfig(config: unknown, schema: ConfigSchema): ValidationResult {
  const validate = ajv.compile(schema);
  if (validate(config)) {
    return { valid: true, errors: [] };
  }
  return {
    valid: false,
    errors: (validate.errors ?? []).map(toValidationError),
  };
}

/**
 * Format validation errors for display
 */
export function formatValidationErrors(result: ValidationResult): string {
  if (result.valid) {
    return 'Configuration is valid.';
  }

  const lines = ['Configuration errors:'];
  for (const error of result.errors) {
    lines.push(`  ${error.path || '(root)'}: ${error.message}`);
  }
  return lines.join('\n');
}
