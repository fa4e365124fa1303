/**
 * Ajv validation instance with schema validators
 * Configuration files must validate before anything reads them
 */

import Ajv, { type ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';
import { getReportConfigSchema } from './schema_loader';
import type { ReportConfigFile } from '@/core/config';

const ajv = new Ajv({
  allErrors: true,
  strict: true,
  strictTypes: true,
  strictTuples: true,
  allowUnionTypes: true,
});

// Add format validators (uri-template, etc.)
addFormats(ajv);

// Lazy-loaded validators
let reportConfigValidator: ValidateFunction<ReportConfigFile> | null = null;

export function getReportConfigValidator(): ValidateFunction<ReportConfigFile> {
  if (!reportConfigValidator) {
    reportConfigValidator = ajv.compile<ReportConfigFile>(getReportConfigSchema());
  }
  return reportConfigValidator;
}

export type ValidationResult<T> =
  | { valid: true; data: T; errors: null }
  | { valid: false; data: null; errors: string[] };

export function validateReportConfig(data: unknown): ValidationResult<ReportConfigFile> {
  const validate = getReportConfigValidator();

  if (validate(data)) {
    return { valid: true, data, errors: null };
  }

  const errors = validate.errors?.map(
    (e) => `${e.instancePath || 'root'}: ${e.message}`
  ) ?? ['Unknown validation error'];

  return { valid: false, data: null, errors };
}
