import { z } from 'zod';

/**
 * OpenAI-compatible chat completion contract of the agent service
 */
export const chatMessageSchema = z.object({
  role: z.enum(['system', 'user', 'assistant', 'tool']),
  content: z.string().min(1)
});

export type ChatMessage = z.infer<typeof chatMessageSchema>;

export const chatCompletionRequestSchema = z.object({
  model: z.string().min(1),
  messages: z.array(chatMessageSchema).min(1),
  stream: z.boolean().optional()
});

export type ChatCompletionRequest = z.infer<typeof chatCompletionRequestSchema>;

export const chatCompletionResponseSchema = z
  .object({
    id: z.string().optional(),
    model: z.string().optional(),
    choices: z
      .array(
        z
          .object({
            index: z.number().int().optional(),
            message: z
              .object({
                role: z.string().optional(),
                content: z.string().nullable()
              })
              .passthrough(),
            finish_reason: z.string().nullable().optional()
          })
          .passthrough()
      )
      .min(1),
    sources: z.unknown().optional()
  })
  .passthrough();

export type ChatCompletionResponse = z.infer<typeof chatCompletionResponseSchema>;

/**
 * GET /api/tags on the LLM server
 */
export const modelTagsSchema = z.object({
  models: z.array(z.object({ name: z.string() }).passthrough())
});

export type ModelTags = z.infer<typeof modelTagsSchema>;
