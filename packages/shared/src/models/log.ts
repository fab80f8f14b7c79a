import { z } from 'zod';
import { nullable, type DeepReadonly } from '../validation.js';

/** A server log uploaded to the vendor's paste service. */
export const logUploadSchema = z.object({
  id: z.string(),
  url: z.string(),
  raw: z.string(),
});

export type LogUpload = DeepReadonly<z.output<typeof logUploadSchema>>;

export const logContentSchema = z.object({
  content: nullable(z.string()),
});

export type LogContent = DeepReadonly<z.output<typeof logContentSchema>>;
