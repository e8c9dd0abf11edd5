import { z } from 'zod';
import { ServiceNameSchema } from '../../common/enums.js';

export const StatusResponseSchema = z.object({
  status: z.literal('healthy'),
  version: z.string().min(1),
  service: z.string().min(1),
  temp_dir: z.string().min(1),
  supported_services: z.array(ServiceNameSchema),
});

export type StatusResponse = z.infer<typeof StatusResponseSchema>;
