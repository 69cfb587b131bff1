/**
 * Starter Resolution
 *
 * Checks a declared lineup against the authoritative depth chart and fills
 * gaps from it. One policy applies to every slot:
 * - lenient: a declared name missing from the chart is replaced by the chart's
 *   name at the slot's depth index
 * - strict: a declared name missing from the chart is rejected
 * Blank slots are filled from the chart under both policies.
 */

import { StarterErrors } from '../../utils/exceptions';
import {
  DeclaredLineup,
  DepthChart,
  LineupSlot,
  Position,
  StarterLineup,
  StarterResolutionPolicy,
} from './types';

interface SlotSpec {
  position: Position;
  /** Zero-based rank on the depth chart used for fallback fills */
  depthIndex: number;
  optional: boolean;
}

export const LINEUP_SLOTS: Readonly<Record<LineupSlot, SlotSpec>> = {
  qb: { position: 'QB', depthIndex: 0, optional: false },
  rb1: { position: 'RB', depthIndex: 0, optional: false },
  rb2: { position: 'RB', depthIndex: 1, optional: true },
  wr1: { position: 'WR', depthIndex: 0, optional: false },
  wr2: { position: 'WR', depthIndex: 1, optional: false },
  wr3: { position: 'WR', depthIndex: 2, optional: true },
  te1: { position: 'TE', depthIndex: 0, optional: false },
  te2: { position: 'TE', depthIndex: 1, optional: true },
};

export const LINEUP_SLOT_ORDER: readonly LineupSlot[] = ['qb', 'rb1', 'rb2', 'wr1', 'wr2', 'wr3', 'te1', 'te2'];

function normalizeName(name: string | null | undefined): string | null {
  const trimmed = name?.trim();
  return trimmed ? trimmed : null;
}

function resolveSlot(
  depthChart: DepthChart,
  slot: LineupSlot,
  declared: string | null,
  policy: StarterResolutionPolicy
): string | null {
  const { position, depthIndex, optional } = LINEUP_SLOTS[slot];
  const listed = (depthChart[position] ?? []).map((name) => name.trim());

  if (declared !== null) {
    if (listed.includes(declared)) return declared;
    if (policy === 'strict') throw StarterErrors.notOnDepthChart(declared, position);
  }

  const fallback = listed[depthIndex];
  if (fallback !== undefined) return fallback;

  // A blank optional slot just means the team has nobody that deep
  if (declared === null && optional) return null;
  throw StarterErrors.outOfRange(position, depthIndex, listed.length);
}

/**
 * Resolve every lineup slot against the depth chart.
 *
 * @throws ValidationException under the strict policy when a declared starter is off the chart
 * @throws OutOfRangeException when a needed fallback is deeper than the chart
 */
export function resolveStarters(
  depthChart: DepthChart,
  declared: DeclaredLineup,
  policy: StarterResolutionPolicy
): StarterLineup {
  const resolved: Record<LineupSlot, string | null> = {
    qb: null,
    rb1: null,
    rb2: null,
    wr1: null,
    wr2: null,
    wr3: null,
    te1: null,
    te2: null,
  };

  for (const slot of LINEUP_SLOT_ORDER) {
    resolved[slot] = resolveSlot(depthChart, slot, normalizeName(declared[slot]), policy);
  }

  return Object.freeze(resolved);
}
