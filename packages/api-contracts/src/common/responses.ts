import { z } from 'zod';

/** Body of every handled error response (4xx and the upload 500). */
export const ErrorDetailResponseSchema = z.object({
  detail: z.string().min(1),
});

/** Body returned when a failure escapes every handler. */
export const InternalErrorResponseSchema = z.object({
  status: z.literal('error'),
  message: z.literal('Internal server error'),
  detail: z.string(),
});

export type ErrorDetailResponse = z.infer<typeof ErrorDetailResponseSchema>;
export type InternalErrorResponse = z.infer<typeof InternalErrorResponseSchema>;
