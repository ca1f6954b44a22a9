/**
 * AJV JSON Schemas for model output and tool wire formats.
 * Plain object schemas (not JSONSchemaType), compiled in validate.ts.
 */

/** The semantic verifier's judgment */
export const verificationVerdictSchema = {
  type: 'object' as const,
  properties: {
    valid: { type: 'boolean' as const },
    issues: { type: 'array' as const, items: { type: 'string' as const } },
    suggestions: { type: 'array' as const, items: { type: 'string' as const } },
  },
  required: ['valid'] as const,
};

/** StructuredResponse as carried inside a format_response tool result */
export const structuredResponseWireSchema = {
  type: 'object' as const,
  properties: {
    response: { type: 'string' as const },
    sql_query: { type: 'string' as const },
    data_results: {
      type: 'array' as const,
      items: { type: 'object' as const },
    },
    row_count: { type: 'integer' as const, minimum: 0 },
  },
  required: ['response', 'sql_query', 'data_results', 'row_count'] as const,
};
