/**
 * Usage Share Derivation
 *
 * Pure functions that turn raw usage counts into per-player shares of team volume.
 * No async I/O, no logging.
 */

import { ValidationException } from '../../utils/exceptions';
import { NewsFlag, PlayerUsageShares, RoleUsageRecord } from './types';

export const NEWS_MULTIPLIERS: Record<NewsFlag, number> = {
  arrow_up: 1.1,
  arrow_down: 0.9,
};

export interface DeriveUsageOptions {
  /**
   * Also renormalize red-zone shares after the news nudge.
   * Off by default: red-zone shares keep the multiplier without being rescaled.
   */
  renormalizeRedZone?: boolean;
}

const COUNT_FIELDS = ['rushAtt', 'targets', 'rzRush', 'rzTgt'] as const;

/** Totals of zero are floored at 1 so an empty window yields zero shares */
function safeTotal(total: number): number {
  return total > 0 ? total : 1;
}

function sumBy<T>(values: T[], pick: (value: T) => number): number {
  return values.reduce((sum, value) => sum + pick(value), 0);
}

function isFiniteNumber(value: unknown): value is number {
  return typeof value === 'number' && Number.isFinite(value);
}

/**
 * Reject records with missing, non-numeric or negative fields instead of
 * treating them as zero.
 */
export function assertValidUsageRecord(key: string, record: RoleUsageRecord): void {
  if (!isFiniteNumber(record.snapPct) || record.snapPct < 0 || record.snapPct > 1) {
    throw new ValidationException(`Usage record for ${key} has invalid snapPct: ${String(record.snapPct)}`);
  }
  for (const field of COUNT_FIELDS) {
    const value: unknown = record[field];
    if (!isFiniteNumber(value) || value < 0) {
      throw new ValidationException(`Usage record for ${key} has invalid ${field}: ${String(value)}`);
    }
  }
}

export function newsMultiplier(flag: NewsFlag | null | undefined): number {
  return flag ? NEWS_MULTIPLIERS[flag] : 1.0;
}

/**
 * Derive usage shares for every key in `records`.
 *
 * 1. Team totals per category (floored at 1)
 * 2. Raw share = count / total
 * 3. News multiplier on every share except snap share
 * 4. Rush and target shares rescaled to sum to 1 again
 */
export function deriveUsageShares(
  records: Readonly<Record<string, RoleUsageRecord>>,
  newsFlags: Readonly<Record<string, NewsFlag | null | undefined>> = {},
  options: DeriveUsageOptions = {}
): Record<string, PlayerUsageShares> {
  const entries = Object.entries(records);
  for (const [key, record] of entries) {
    assertValidUsageRecord(key, record);
  }

  const rows = entries.map(([, record]) => record);
  const totalRush = safeTotal(sumBy(rows, (r) => r.rushAtt));
  const totalTargets = safeTotal(sumBy(rows, (r) => r.targets));
  const totalRzRush = safeTotal(sumBy(rows, (r) => r.rzRush));
  const totalRzTargets = safeTotal(sumBy(rows, (r) => r.rzTgt));

  const usage: Record<string, PlayerUsageShares> = {};
  for (const [key, record] of entries) {
    const mult = newsMultiplier(Object.hasOwn(newsFlags, key) ? newsFlags[key] : undefined);
    usage[key] = {
      snapShare: record.snapPct,
      rushShare: (record.rushAtt / totalRush) * mult,
      targetShare: (record.targets / totalTargets) * mult,
      rzRushShare: (record.rzRush / totalRzRush) * mult,
      rzTargetShare: (record.rzTgt / totalRzTargets) * mult,
    };
  }

  const shares = Object.values(usage);
  const rushSum = safeTotal(sumBy(shares, (u) => u.rushShare));
  const targetSum = safeTotal(sumBy(shares, (u) => u.targetShare));
  const rzRushSum = safeTotal(sumBy(shares, (u) => u.rzRushShare));
  const rzTargetSum = safeTotal(sumBy(shares, (u) => u.rzTargetShare));

  for (const u of shares) {
    u.rushShare /= rushSum;
    u.targetShare /= targetSum;
    if (options.renormalizeRedZone) {
      u.rzRushShare /= rzRushSum;
      u.rzTargetShare /= rzTargetSum;
    }
  }

  return usage;
}
