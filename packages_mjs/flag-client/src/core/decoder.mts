/**
 * JSON decoders
 */
import { DecodeError } from '../errors.mjs';
import {
  flagListSchema,
  identitySchema,
  realtimeEventSchema,
  type Flag,
  type Identity,
  type RealtimeUpdate,
} from '../schemas.mjs';
import type { Decoder } from '../types.mjs';

/**
 * Anything with a zod-style parse method
 */
export interface ParseSchema<T> {
  parse(data: unknown): T;
}

/**
 * Decoder that parses JSON and validates it against a schema
 */
export function jsonDecoder<T>(schema: ParseSchema<T>): Decoder<T> {
  return {
    decode(bytes: Buffer): T {
      let data: unknown;
      try {
        data = JSON.parse(bytes.toString('utf8'));
      } catch (error) {
        throw new DecodeError(error);
      }

      try {
        return schema.parse(data);
      } catch (error) {
        throw new DecodeError(error);
      }
    },
  };
}

export const flagsDecoder: Decoder<Flag[]> = jsonDecoder(flagListSchema);
export const identityDecoder: Decoder<Identity> = jsonDecoder(identitySchema);
export const realtimeUpdateDecoder: Decoder<RealtimeUpdate> = jsonDecoder(realtimeEventSchema);
