/**
 * Config file options (server.properties and similar).
 *
 * The wire value is a bare scalar whose kind is chosen by the sibling `type`
 * field. It is decoded into a tagged ConfigValue so that an integer never
 * turns into a float, and a boolean never turns into a string, after decoding.
 */
import { z } from 'zod';
import { nullable } from '../validation.js';

export type ConfigOptionType = 'string' | 'integer' | 'float' | 'boolean' | 'select' | 'multiselect';

export type ConfigValueKind = 'string' | 'integer' | 'float' | 'boolean';

export type ConfigValue =
  | { readonly kind: 'string'; readonly value: string }
  | { readonly kind: 'integer'; readonly value: number }
  | { readonly kind: 'float'; readonly value: number }
  | { readonly kind: 'boolean'; readonly value: boolean };

export type ConfigScalar = ConfigValue['value'];

/** Plain `{ key: value }` map accepted by the config write endpoint. */
export type ConfigUpdate = Record<string, ConfigScalar>;

export interface ConfigOption {
  readonly key: string;
  readonly label: string;
  readonly type: ConfigOptionType;
  readonly value: ConfigValue;
  /** Permitted values, only for `select` and `multiselect`. */
  readonly options: readonly ConfigValue[] | null;
}

const scalarSchema = z.union([z.string(), z.number(), z.boolean()]);

/** Kind of a bare wire scalar: integral numbers are integers. */
export function kindOf(value: ConfigScalar): ConfigValueKind {
  if (typeof value === 'string') return 'string';
  if (typeof value === 'boolean') return 'boolean';
  return Number.isInteger(value) ? 'integer' : 'float';
}

/** `kind` only chooses between integer and float for numeric values. */
export function toConfigValue(value: ConfigScalar, kind: ConfigValueKind = kindOf(value)): ConfigValue {
  if (typeof value === 'string') return { kind: 'string', value };
  if (typeof value === 'boolean') return { kind: 'boolean', value };
  return kind === 'float' ? { kind: 'float', value } : { kind: 'integer', value };
}

function selectTypeOf(value: ConfigScalar): 'string' | 'number' | 'boolean' {
  if (typeof value === 'string') return 'string';
  if (typeof value === 'boolean') return 'boolean';
  return 'number';
}

/** Numeric selects are float when any value or option is fractional. */
function selectKind(value: ConfigScalar, options: readonly ConfigScalar[] | null): ConfigValueKind {
  const kind = kindOf(value);
  if (kind !== 'integer') return kind;
  return options?.some((o) => kindOf(o) === 'float') ? 'float' : 'integer';
}

function typedOption<T extends 'string' | 'integer' | 'float' | 'boolean', V extends z.ZodTypeAny>(
  type: T,
  value: V,
) {
  return z.object({
    key: z.string(),
    label: z.string(),
    type: z.literal(type),
    value,
    options: nullable(z.array(value)),
  });
}

function selectOption<T extends 'select' | 'multiselect'>(type: T) {
  return z.object({
    key: z.string(),
    label: z.string(),
    type: z.literal(type),
    value: scalarSchema,
    options: nullable(z.array(scalarSchema)),
  });
}

const wireOptionSchema = z
  .discriminatedUnion('type', [
    typedOption('string', z.string()),
    typedOption('integer', z.number().int()),
    typedOption('float', z.number()),
    typedOption('boolean', z.boolean()),
    selectOption('select'),
    selectOption('multiselect'),
  ])
  .superRefine((option, ctx) => {
    if (option.type !== 'select' && option.type !== 'multiselect') return;
    // permitted values share the type of the current value; numbers form one type
    const expected = selectTypeOf(option.value);
    option.options?.forEach((permitted, index) => {
      const actual = selectTypeOf(permitted);
      if (actual !== expected) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['options', index],
          message: `Expected ${expected}, received ${actual}`,
        });
      }
    });
  });

export const configOptionSchema = wireOptionSchema.transform((wire): ConfigOption => {
  // declared scalar types fix the kind; select types take it from their values
  const permitted: readonly ConfigScalar[] | null = wire.options;
  const kind = wire.type === 'select' || wire.type === 'multiselect' ? selectKind(wire.value, permitted) : wire.type;
  return {
    key: wire.key,
    label: wire.label,
    type: wire.type,
    value: toConfigValue(wire.value, kind),
    options: permitted === null ? null : permitted.map((o) => toConfigValue(o, kind)),
  };
});

/** Flattens decoded options back into the write endpoint's `{ key: value }` form. */
export function toConfigUpdate(options: readonly ConfigOption[]): ConfigUpdate {
  const update: ConfigUpdate = {};
  for (const option of options) {
    update[option.key] = option.value.value;
  }
  return update;
}
