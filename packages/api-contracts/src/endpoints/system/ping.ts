import { z } from 'zod';

export const PingResponseSchema = z.object({
  message: z.literal('Server running'),
});

export type PingResponse = z.infer<typeof PingResponseSchema>;
