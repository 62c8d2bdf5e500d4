/**
 * AJV JSON Schema for schema descriptor files.
 * Plain object schema (not JSONSchemaType) so optional fields stay simple.
 */

const identifier = { type: 'string' as const, pattern: '^[A-Za-z_][A-Za-z0-9_]*$' };

export const schemaDescriptorJsonSchema = {
  type: 'object' as const,
  properties: {
    tables: {
      type: 'array' as const,
      minItems: 1,
      items: {
        type: 'object' as const,
        properties: {
          name: identifier,
          description: { type: 'string' as const },
          columns: {
            type: 'array' as const,
            minItems: 1,
            items: {
              type: 'object' as const,
              properties: {
                name: identifier,
                type: { type: 'string' as const, enum: ['integer', 'text'] },
                description: { type: 'string' as const },
              },
              required: ['name', 'type'] as const,
              additionalProperties: false,
            },
          },
        },
        required: ['name', 'columns'] as const,
        additionalProperties: false,
      },
    },
    examples: {
      type: 'array' as const,
      items: {
        type: 'object' as const,
        properties: {
          question: { type: 'string' as const, minLength: 1 },
          sql: { type: 'string' as const, minLength: 1 },
        },
        required: ['question', 'sql'] as const,
        additionalProperties: false,
      },
    },
  },
  required: ['tables'] as const,
  additionalProperties: false,
};
