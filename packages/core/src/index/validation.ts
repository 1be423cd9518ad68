import type { JsonSchema, ToolDefinition } from '../types/index.js'
import { z } from 'zod'
import { ToolDefinitionError } from '../errors.js'

/**
 * Lenient JSON Schema shape: only the keys the tokenizer reads are checked,
 * everything else passes through untouched.
 */
export const jsonSchemaSchema: z.ZodType<JsonSchema> = z.lazy(() =>
  z
    .object({
      type: z.union([z.string(), z.array(z.string())]).optional(),
      properties: z.record(z.string(), jsonSchemaSchema).optional(),
      required: z.array(z.string()).optional(),
      description: z.string().optional(),
      items: z.union([jsonSchemaSchema, z.array(jsonSchemaSchema)]).optional(),
      enum: z.array(z.unknown()).optional(),
    })
    .passthrough(),
)

export const toolDefinitionSchema = z.object({
  name: z.string().min(1, 'missing or invalid \'name\''),
  description: z.string().optional(),
  inputSchema: jsonSchemaSchema.optional(),
  input_schema: jsonSchemaSchema.optional(),
})

/**
 * Validate raw data as a tool definition
 *
 * @param location - Used in the error message, e.g. `tools.json[3]`
 */
export function parseToolDefinition(data: unknown, location: string): ToolDefinition {
  const result = toolDefinitionSchema.safeParse(data)

  if (!result.success) {
    const details = result.error.issues
      .map(issue => issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message)
      .join('; ')
    throw new ToolDefinitionError(location, details)
  }

  return result.data
}
