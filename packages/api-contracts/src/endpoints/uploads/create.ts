import { z } from 'zod';
import { ServiceNameSchema, UploadStatusSchema } from '../../common/enums.js';

export const UploadResponseSchema = z.object({
  status: UploadStatusSchema,
  message: z.string().min(1),
  filename: z.string().min(1),
  service: ServiceNameSchema,
  link: z.string().min(1),
});

export type UploadResponse = z.infer<typeof UploadResponseSchema>;
