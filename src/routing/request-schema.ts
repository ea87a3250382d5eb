/**
 * Validation of the known fields of a chat completion request.
 * Unknown keys pass through untouched to the provider.
 */

import { z } from 'zod';
import { RequestValidationError } from '../shared/errors.js';
import type { ChatCompletionRequest } from '../shared/types.js';

const MessageSchema = z.looseObject({
  role: z.string().min(1),
});

export const ChatCompletionRequestSchema = z.looseObject({
  model: z.string().min(1, { message: 'model is required' }),
  messages: z.array(MessageSchema).min(1, { message: 'messages must not be empty' }),
  stream: z.boolean().nullish(),
  temperature: z.number().nullish(),
  max_tokens: z.number().int().positive().nullish(),
  timeout: z.number().positive().nullish(),
  num_retries: z.number().int().nonnegative().nullish(),
});

/**
 * Validate a decoded request body.
 * @throws RequestValidationError listing every failing field.
 */
export function parseChatRequest(body: unknown): ChatCompletionRequest {
  const result = ChatCompletionRequestSchema.safeParse(body);
  if (!result.success) {
    throw new RequestValidationError(`Invalid request: ${z.prettifyError(result.error)}`);
  }
  return result.data;
}
