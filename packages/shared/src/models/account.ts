import { z } from 'zod';
import type { DeepReadonly } from '../validation.js';

export const accountSchema = z.object({
  name: z.string(),
  email: z.string(),
  verified: z.boolean(),
  // documented as an integer, sent as a fractional number
  credits: z.number(),
});

export type Account = DeepReadonly<z.output<typeof accountSchema>>;
