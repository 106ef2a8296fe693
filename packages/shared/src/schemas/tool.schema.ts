import { z } from 'zod';

// Property schemas stay loose here; the bridge decides what each keyword means.
export const jsonSchemaPropertySchema = z.record(z.string(), z.unknown());

export const mcpToolDescriptorSchema = z.object({
  name: z.string().min(1),
  description: z.string().optional(),
  inputSchema: z.object({
    type: z.literal('object'),
    properties: z.record(z.string(), jsonSchemaPropertySchema).optional(),
    required: z.array(z.string()).optional(),
  }),
});

export const catalogFileSchema = z.array(mcpToolDescriptorSchema);

export const validateToolCallArgsSchema = z.object({
  tool_name: z.string().min(1),
  arguments: z.record(z.string(), z.unknown()),
});

export const contextPageArgsSchema = z.object({
  context_id: z.string().min(1),
  page: z.number(),
  page_size: z.number().optional(),
});

export const contextInfoArgsSchema = z.object({
  context_id: z.string().min(1),
});

export const searchContextArgsSchema = z.object({
  search_criteria: z.record(z.string(), z.unknown()),
  page_size: z.number().optional(),
});
