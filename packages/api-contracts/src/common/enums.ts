import { z } from 'zod';

export const ServiceNameSchema = z.enum(['mega']);

export const UploadStatusSchema = z.enum(['success']);

export type ServiceName = z.infer<typeof ServiceNameSchema>;
export type UploadStatus = z.infer<typeof UploadStatusSchema>;
