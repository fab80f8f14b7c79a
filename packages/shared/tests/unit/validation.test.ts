/**
 * Unit tests for record construction: frozen results typed as readonly.
 */
import { describe, it, expect, expectTypeOf } from 'vitest';
import { stringListSchema } from '../../src/models/options.js';
import { configOptionSchema, type ConfigOption } from '../../src/models/config-option.js';
import { parseRecord, parseRecords } from '../../src/validation.js';

describe('parseRecord', () => {
  it('should return a frozen list typed as readonly', () => {
    const entries = parseRecord(stringListSchema, ['b', 'a'], 'PlayerList');

    expectTypeOf(entries).toEqualTypeOf<readonly string[]>();
    expect(Object.isFrozen(entries)).toBe(true);
    expect([...entries].sort()).toEqual(['a', 'b']);
  });
});

describe('parseRecords', () => {
  it('should freeze the list and every record in it', () => {
    const options = parseRecords(
      configOptionSchema,
      [{ key: 'pvp', label: 'PvP', type: 'boolean', value: true }],
      'ConfigOption',
    );

    expectTypeOf(options).toMatchTypeOf<readonly ConfigOption[]>();
    expect(Object.isFrozen(options)).toBe(true);
    expect(Object.isFrozen(options[0])).toBe(true);
    expect(Object.isFrozen(options[0]?.value)).toBe(true);
  });
});
