export {
  getSchemaPath,
  getSchema,
  validateOutput,
  validateOutputOrThrow,
  formatValidationErrors,
  OUTPUT_SCHEMA_FILE,
} from './ajv-validator.js';

export type { ValidationResult, ValidationError } from './ajv-validator.js';

// Balance checks
export { checkLineBalance, formatLineBalanceResult } from './reconciliation.js';

export type { LineBalanceResult, LineBalanceOptions } from './reconciliation.js';
