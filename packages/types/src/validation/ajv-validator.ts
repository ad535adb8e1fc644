/**
 * AJV-based JSON Schema validation for output documents.
 * The schema lives beside the package sources in schemas/.
 */

import AjvModule from 'ajv';
import type { SchemaObject, ValidateFunction } from 'ajv';
import ajvFormats from 'ajv-formats';
import { readFileSync } from 'fs';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';

const Ajv = AjvModule.default;
const addFormats = ajvFormats.default;

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const OUTPUT_SCHEMA_FILE = 'statement-output.schema.json';

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
}

export function getSchemaPath(): string {
  return resolve(__dirname, '../../schemas', OUTPUT_SCHEMA_FILE);
}

let cachedSchema: unknown = null;

/**
 * Load the output JSON schema from disk (cached)
 */
export function getSchema(): unknown {
  if (cachedSchema === null) {
    const schemaContent = readFileSync(getSchemaPath(), 'utf-8');
    const parsed: unknown = JSON.parse(schemaContent);
    cachedSchema = parsed;
  }
  return cachedSchema;
}

function isSchemaObject(value: unknown): value is SchemaObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

let compiledValidator: ValidateFunction | null = null;

function getValidator(): ValidateFunction {
  if (compiledValidator === null) {
    const schema = getSchema();
    if (!isSchemaObject(schema)) {
      throw new Error(`Schema file ${OUTPUT_SCHEMA_FILE} does not contain a JSON object`);
    }
    const ajv = new Ajv({
      allErrors: true,
      strict: false,
      validateFormats: true,
    });
    addFormats(ajv);
    compiledValidator = ajv.compile(schema);
  }
  return compiledValidator;
}

/**
 * Validate an output document against the statement output schema
 */
export function validateOutput(payload: unknown): ValidationResult {
  const validate = getValidator();
  const valid = validate(payload);

  if (valid) {
    return { valid: true, errors: [] };
  }

  const rawErrors = validate.errors ?? [];
  const errors: ValidationError[] = rawErrors.map((err) => ({
    path: err.instancePath || '/',
    message: err.message ?? 'Unknown validation error',
    keyword: err.keyword,
  }));

  return { valid: false, errors };
}

/**
 * Validate an output document and throw an error if invalid
 */
export function validateOutputOrThrow(payload: unknown): void {
  const result = validateOutput(payload);
  if (!result.valid) {
    const errorMessages = result.errors
      .slice(0, 10)
      .map((e) => `  ${e.path}: ${e.message} (${e.keyword})`)
      .join('\n');
    throw new Error(`Schema validation failed:\n${errorMessages}`);
  }
}

export function formatValidationErrors(errors: ValidationError[]): string[] {
  return errors.map((e) => `[${e.keyword}] ${e.path}: ${e.message}`);
}
