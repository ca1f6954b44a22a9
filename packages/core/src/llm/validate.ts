/**
 * Compiled AJV validators shared by the tools and the response codec.
 */

import ajvModule, { type ErrorObject } from 'ajv';
import { structuredResponseWireSchema, verificationVerdictSchema } from './schema_json.js';
import type { ToolParameters } from './types.js';

// ajv is CommonJS; under ESM the default import is module.exports, whose
// `default` property is the Ajv class.
const Ajv = ajvModule.default;

export const ajv = new Ajv({ allErrors: true });

export interface VerificationVerdict {
  valid: boolean;
  issues?: string[];
  suggestions?: string[];
}

export interface StructuredResponseWire {
  response: string;
  sql_query: string;
  data_results: Record<string, unknown>[];
  row_count: number;
}

export const validateVerdict = ajv.compile<VerificationVerdict>(verificationVerdictSchema);

export const validateStructuredResponseWire = ajv.compile<StructuredResponseWire>(structuredResponseWireSchema);

export function compileArgumentsValidator(parameters: ToolParameters) {
  return ajv.compile<Record<string, string>>({ ...parameters });
}

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): string {
  if (!errors || errors.length === 0) return 'Unknown validation error';
  return errors.map((e) => `${e.instancePath || '/'}: ${e.message ?? 'invalid'}`).join('; ');
}
