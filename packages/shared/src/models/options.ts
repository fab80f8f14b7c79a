import { z } from 'zod';
import type { DeepReadonly } from '../validation.js';

/** RAM allocation in GB. */
export const ramSettingSchema = z.object({
  ram: z.number().int(),
});

export type RamSetting = DeepReadonly<z.output<typeof ramSettingSchema>>;

export const motdSettingSchema = z.object({
  motd: z.string(),
});

export type MotdSetting = DeepReadonly<z.output<typeof motdSettingSchema>>;

export const stringListSchema = z.array(z.string());
