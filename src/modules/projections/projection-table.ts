/**
 * Tabular view of team projections: one row per player, a fixed column order,
 * sorting and CSV export.
 */

import { LINEUP_SLOTS, LINEUP_SLOT_ORDER, LineupSlot, Position } from '../../domain/projection';
import { TeamProjectionResult } from './projections.model';

export interface ProjectionRow {
  player: string;
  team: string;
  slot: LineupSlot;
  position: Position;
  meanYards: number;
  floorYards: number;
  meanReceptions: number | null;
  floorReceptions: number | null;
  meanTds: number;
  floorTds: number;
}

export type NumericColumn =
  | 'meanYards'
  | 'floorYards'
  | 'meanReceptions'
  | 'floorReceptions'
  | 'meanTds'
  | 'floorTds';

export type SortColumn = NumericColumn | 'player';

export const SORT_COLUMNS: readonly SortColumn[] = [
  'player',
  'meanYards',
  'floorYards',
  'meanReceptions',
  'floorReceptions',
  'meanTds',
  'floorTds',
];

/** Header label and row key, in export order */
const CSV_COLUMNS: ReadonlyArray<readonly [string, keyof ProjectionRow]> = [
  ['Player', 'player'],
  ['Team', 'team'],
  ['Slot', 'slot'],
  ['Position', 'position'],
  ['Mean Yards', 'meanYards'],
  ['TC Floor Yards', 'floorYards'],
  ['Mean Receptions', 'meanReceptions'],
  ['TC Floor Receptions', 'floorReceptions'],
  ['Mean TDs', 'meanTds'],
  ['TC Floor TDs', 'floorTds'],
];

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

function roundOrNull(value: number | null): number | null {
  return value === null ? null : round2(value);
}

/**
 * Flatten a team result into rows in lineup order.
 */
export function toProjectionRows(result: TeamProjectionResult): ProjectionRow[] {
  const rows: ProjectionRow[] = [];
  const seen = new Set<string>();

  for (const slot of LINEUP_SLOT_ORDER) {
    const player = result.starters[slot];
    if (player === null || seen.has(player)) continue;
    if (!Object.hasOwn(result.projections, player)) continue;
    const projection = result.projections[player];
    seen.add(player);

    rows.push({
      player,
      team: result.team,
      slot,
      position: LINEUP_SLOTS[slot].position,
      meanYards: round2(projection.meanYards),
      floorYards: round2(projection.floorYards),
      meanReceptions: roundOrNull(projection.meanReceptions),
      floorReceptions: roundOrNull(projection.floorReceptions),
      meanTds: round2(projection.meanTds),
      floorTds: round2(projection.floorTds),
    });
  }

  return rows;
}

/**
 * Sort rows by a column. Numbers default to descending with empty values last;
 * player names sort alphabetically.
 */
export function sortProjectionRows(
  rows: readonly ProjectionRow[],
  column: SortColumn,
  direction: 'asc' | 'desc' = column === 'player' ? 'asc' : 'desc'
): ProjectionRow[] {
  const sign = direction === 'asc' ? 1 : -1;

  return [...rows].sort((a, b) => {
    if (column === 'player') {
      return sign * a.player.localeCompare(b.player);
    }
    const left = a[column];
    const right = b[column];
    if (left === null && right === null) return 0;
    if (left === null) return 1;
    if (right === null) return -1;
    return sign * (left - right);
  });
}

function formatCsvValue(value: ProjectionRow[keyof ProjectionRow]): string {
  if (value === null) return '';
  return String(value);
}

function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function projectionRowsToCsv(rows: readonly ProjectionRow[]): string {
  const lines = [CSV_COLUMNS.map(([header]) => escapeCsvField(header)).join(',')];
  for (const row of rows) {
    lines.push(CSV_COLUMNS.map(([, key]) => escapeCsvField(formatCsvValue(row[key]))).join(','));
  }
  return lines.join('\n');
}

/** e.g. "2025-14_DAL_at_DET_projections.csv" */
export function projectionCsvFileName(seasonWeek: string, away: string, home: string): string {
  const safe = (part: string) => part.replace(/[^A-Za-z0-9-]/g, '');
  return `${safe(seasonWeek)}_${safe(away)}_at_${safe(home)}_projections.csv`;
}
