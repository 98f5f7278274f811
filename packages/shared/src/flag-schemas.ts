/**
 * Zod schemas for flags, gates, and cache invalidation messages.
 *
 * A flag is a named list of gates. The persistence layer owns flag state;
 * every other layer treats a {@link FlagState} as an opaque value that can
 * be serialized and compared.
 *
 * @module shared/flag-schemas
 */
import { z } from 'zod';

// === Names ===

export const FlagNameSchema = z.string().min(1).max(255);

export type FlagName = z.infer<typeof FlagNameSchema>;

// === Gates ===

const RatioSchema = z.number().gt(0).lt(1);

export const BooleanGateSchema = z.object({
  type: z.literal('boolean'),
  enabled: z.boolean(),
});

export const ActorGateSchema = z.object({
  type: z.literal('actor'),
  for: z.string().min(1),
  enabled: z.boolean(),
});

export const GroupGateSchema = z.object({
  type: z.literal('group'),
  for: z.string().min(1),
  enabled: z.boolean(),
});

export const PercentageOfTimeGateSchema = z.object({
  type: z.literal('percentage_of_time'),
  for: RatioSchema,
});

export const PercentageOfActorsGateSchema = z.object({
  type: z.literal('percentage_of_actors'),
  for: RatioSchema,
});

export const GateSchema = z.discriminatedUnion('type', [
  BooleanGateSchema,
  ActorGateSchema,
  GroupGateSchema,
  PercentageOfTimeGateSchema,
  PercentageOfActorsGateSchema,
]);

export type Gate = z.infer<typeof GateSchema>;
export type GateType = Gate['type'];

// === Flags ===

export const FlagStateSchema = z.object({
  name: FlagNameSchema,
  gates: z.array(GateSchema),
});

export type FlagState = z.infer<typeof FlagStateSchema>;

// === Invalidation ===

export const InvalidationTargetSchema = z.discriminatedUnion('scope', [
  z.object({ scope: z.literal('flag'), flagName: FlagNameSchema }),
  z.object({ scope: z.literal('all') }),
]);

export type InvalidationTarget = z.infer<typeof InvalidationTargetSchema>;

export const InvalidationMessageSchema = z.object({
  target: InvalidationTargetSchema,
  origin: z.string().min(1).describe('NodeIdentity of the publishing process'),
  sentAt: z.string().datetime(),
});

export type InvalidationMessage = z.infer<typeof InvalidationMessageSchema>;
