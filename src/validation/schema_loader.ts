/**
 * Schema loading utility
 */

import { readFileSync } from 'fs';
import { join } from 'path';
import type { AnySchemaObject } from 'ajv';

const schemaCache = new Map<string, AnySchemaObject>();

export function loadSchema(schemaName: string): AnySchemaObject {
  const cached = schemaCache.get(schemaName);
  if (cached) {
    return cached;
  }

  const projectRoot = process.cwd();
  const schemaPath = join(projectRoot, 'schemas', `${schemaName}.schema.json`);
  const schemaJson = readFileSync(schemaPath, 'utf-8');
  const schema: AnySchemaObject = JSON.parse(schemaJson);

  schemaCache.set(schemaName, schema);
  return schema;
}

export function getReportConfigSchema(): AnySchemaObject {
  return loadSchema('report_config.v1');
}
