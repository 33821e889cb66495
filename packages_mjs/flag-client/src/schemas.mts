/**
 * zod schemas for flag API payloads.
 * Wire fields are snake_case; parsed values are camelCase.
 */
import { z } from 'zod';

export const flagValueSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export type FlagValue = z.infer<typeof flagValueSchema>;

export interface Feature {
  id: number;
  name: string;
  type: string;
  description: string | null;
}

export interface Flag {
  feature: Feature;
  enabled: boolean;
  value: FlagValue;
}

export interface Trait {
  key: string;
  value: FlagValue;
  transient: boolean;
}

export interface Identity {
  identifier: string | null;
  flags: Flag[];
  traits: Trait[];
}

export interface RealtimeUpdate {
  /** Seconds since the epoch */
  updatedAt: number;
}

export const featureSchema = z
  .object({
    id: z.number(),
    name: z.string(),
    type: z.string().optional(),
    description: z.string().nullable().optional(),
  })
  .transform(
    (feature): Feature => ({
      id: feature.id,
      name: feature.name,
      type: feature.type ?? 'STANDARD',
      description: feature.description ?? null,
    })
  );

export const flagSchema = z
  .object({
    feature: featureSchema,
    enabled: z.boolean(),
    feature_state_value: flagValueSchema.optional(),
  })
  .transform(
    (flag): Flag => ({
      feature: flag.feature,
      enabled: flag.enabled,
      value: flag.feature_state_value ?? null,
    })
  );

export const flagListSchema = z.array(flagSchema);

export const traitSchema = z
  .object({
    trait_key: z.string(),
    trait_value: flagValueSchema.optional(),
    transient: z.boolean().optional(),
  })
  .transform(
    (trait): Trait => ({
      key: trait.trait_key,
      value: trait.trait_value ?? null,
      transient: trait.transient ?? false,
    })
  );

export const identitySchema = z
  .object({
    identifier: z.string().optional(),
    flags: z.array(flagSchema),
    traits: z.array(traitSchema).optional(),
  })
  .transform(
    (identity): Identity => ({
      identifier: identity.identifier ?? null,
      flags: identity.flags,
      traits: identity.traits ?? [],
    })
  );

export const realtimeEventSchema = z
  .object({
    updated_at: z.number(),
  })
  .transform((event): RealtimeUpdate => ({ updatedAt: event.updated_at }));
