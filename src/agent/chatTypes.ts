/**
 * Shared TypeScript types that describe the chat transcript exchanged with
 * OpenRouter and the tool call payloads the model can emit.
 */
import { z } from "zod";

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string };

export const openRouterResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z.array(
    z.object({
      message: z
        .object({
          content: z.unknown().optional(),
          tool_calls: z
            .array(
              z.object({
                id: z.string(),
                type: z.literal("function"),
                function: z.object({
                  name: z.string(),
                  arguments: z.string().optional(),
                }),
              }),
            )
            .optional()
            .nullable(),
        })
        .optional(),
    }),
  ),
});

export type OpenRouterResponsePayload = z.infer<typeof openRouterResponseSchema>;
