/**
 * Pure functions for combining gates into flag state.
 *
 * Shared by every persistence adapter so they agree on which gate a write
 * replaces and on the canonical gate order.
 *
 * @module store/gates
 */
import type { FlagName, FlagState, Gate } from './types.js';

const TYPE_ORDER: Record<Gate['type'], number> = {
  boolean: 0,
  actor: 1,
  group: 2,
  percentage_of_time: 3,
  percentage_of_actors: 3,
};

/** The state returned for a flag that has never been written: no gates, disabled. */
export function emptyFlag(name: FlagName): FlagState {
  return { name, gates: [] };
}

/**
 * Whether two gates occupy the same slot in a flag.
 *
 * Actor and group gates are keyed by their target; the two percentage
 * kinds share one slot, so setting either replaces the other.
 */
export function sameSlot(a: Gate, b: Gate): boolean {
  switch (a.type) {
    case 'boolean':
      return b.type === 'boolean';
    case 'actor':
    case 'group':
      return b.type === a.type && b.for === a.for;
    case 'percentage_of_time':
    case 'percentage_of_actors':
      return b.type === 'percentage_of_time' || b.type === 'percentage_of_actors';
  }
}

/** Sort gates into canonical order so structurally equal flags compare equal. */
export function sortGates(gates: readonly Gate[]): Gate[] {
  return [...gates].sort((a, b) => {
    const byType = TYPE_ORDER[a.type] - TYPE_ORDER[b.type];
    if (byType !== 0) return byType;
    const aKey = gateTarget(a);
    const bKey = gateTarget(b);
    return aKey < bKey ? -1 : aKey > bKey ? 1 : 0;
  });
}

function gateTarget(gate: Gate): string {
  return gate.type === 'actor' || gate.type === 'group' ? gate.for : '';
}

/** Return a new flag with `gate` replacing whatever occupied its slot. */
export function withGate(flag: FlagState, gate: Gate): FlagState {
  const gates = flag.gates.filter((g) => !sameSlot(g, gate));
  gates.push(gate);
  return { name: flag.name, gates: sortGates(gates) };
}

/** Return a new flag without the gate occupying `gate`'s slot. */
export function withoutGate(flag: FlagState, gate: Gate): FlagState {
  return { name: flag.name, gates: flag.gates.filter((g) => !sameSlot(g, gate)) };
}
