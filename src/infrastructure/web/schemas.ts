import { z } from 'zod';

const requiredText = (field: string) =>
  z
    .string({ required_error: `${field} is required`, invalid_type_error: `${field} must be a string` })
    .trim()
    .min(1, `${field} must not be empty`);

/**
 * POST /ask
 */
export const AskBodySchema = z.object({
  user_id: requiredText('user_id'),
  thread: requiredText('thread').nullish(),
  question: requiredText('question'),
});

/**
 * POST /getchathistory
 */
export const ChatHistoryBodySchema = z.object({
  user_id: requiredText('user_id'),
});

export const UserParamsSchema = z.object({
  userId: requiredText('userId'),
});

export const ThreadParamsSchema = UserParamsSchema.extend({
  threadId: requiredText('threadId'),
});
