/**
 * Tests for flag payload schemas and decoders
 */

import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { DecodeError } from '../src/errors.mjs';
import {
  flagsDecoder,
  identityDecoder,
  jsonDecoder,
  realtimeUpdateDecoder,
} from '../src/core/decoder.mjs';

const bytes = (value: unknown): Buffer => Buffer.from(JSON.stringify(value));

describe('flagsDecoder', () => {
  it('should decode flags into camelCase values', () => {
    const flags = flagsDecoder.decode(
      bytes([
        {
          feature: { id: 1, name: 'banner', type: 'MULTIVARIATE', description: 'Top banner' },
          enabled: true,
          feature_state_value: 'blue',
        },
        { feature: { id: 2, name: 'beta' }, enabled: false },
      ])
    );

    expect(flags).toEqual([
      {
        feature: { id: 1, name: 'banner', type: 'MULTIVARIATE', description: 'Top banner' },
        enabled: true,
        value: 'blue',
      },
      {
        feature: { id: 2, name: 'beta', type: 'STANDARD', description: null },
        enabled: false,
        value: null,
      },
    ]);
  });

  it('should fail with the JSON error as cause', () => {
    let error: unknown;
    try {
      flagsDecoder.decode(Buffer.from('not json'));
    } catch (caught) {
      error = caught;
    }

    expect(error).toBeInstanceOf(DecodeError);
    expect(error).toMatchObject({ code: 'DECODE' });
    expect(error instanceof DecodeError && error.cause).toBeInstanceOf(SyntaxError);
  });

  it('should fail with the schema error as cause', () => {
    let error: unknown;
    try {
      flagsDecoder.decode(bytes([{ enabled: true }]));
    } catch (caught) {
      error = caught;
    }

    expect(error).toBeInstanceOf(DecodeError);
    expect(error instanceof DecodeError && error.cause).toBeInstanceOf(ZodError);
  });
});

describe('identityDecoder', () => {
  it('should decode an identity with traits', () => {
    const identity = identityDecoder.decode(
      bytes({
        identifier: 'user-1',
        flags: [],
        traits: [
          { trait_key: 'plan', trait_value: 'pro' },
          { trait_key: 'age', trait_value: 42, transient: true },
        ],
      })
    );

    expect(identity).toEqual({
      identifier: 'user-1',
      flags: [],
      traits: [
        { key: 'plan', value: 'pro', transient: false },
        { key: 'age', value: 42, transient: true },
      ],
    });
  });

  it('should default a missing identifier and traits', () => {
    expect(identityDecoder.decode(bytes({ flags: [] }))).toEqual({
      identifier: null,
      flags: [],
      traits: [],
    });
  });
});

describe('realtimeUpdateDecoder', () => {
  it('should decode the update time', () => {
    expect(realtimeUpdateDecoder.decode(bytes({ updated_at: 1700000000.25 }))).toEqual({
      updatedAt: 1700000000.25,
    });
  });
});

describe('jsonDecoder', () => {
  it('should accept any schema with a parse method', () => {
    const decoder = jsonDecoder({
      parse: (data: unknown): string => {
        if (typeof data !== 'string') throw new TypeError('expected a string');
        return data.toUpperCase();
      },
    });

    expect(decoder.decode(Buffer.from('"on"'))).toBe('ON');
    expect(() => decoder.decode(Buffer.from('1'))).toThrow('Failed to decode response: expected a string');
  });
});
