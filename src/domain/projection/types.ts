/**
 * Projection Engine Types
 *
 * Shapes shared by the pure projection functions. Callers map provider
 * payloads into these before handing them to the engine.
 */

export type Position = 'QB' | 'RB' | 'WR' | 'TE';

/** Ordered player names per position code, best first */
export type DepthChart = Partial<Record<string, readonly string[]>>;

export type LineupSlot = 'qb' | 'rb1' | 'rb2' | 'wr1' | 'wr2' | 'wr3' | 'te1' | 'te2';

export type StarterLineup = Readonly<Record<LineupSlot, string | null>>;

/** User-declared lineup; any slot may be left out or blank */
export type DeclaredLineup = Partial<Record<LineupSlot, string | null>>;

export type StarterResolutionPolicy = 'strict' | 'lenient';

/** Trailing-window usage counts for one player (or role) */
export interface RoleUsageRecord {
  snapPct: number;
  rushAtt: number;
  targets: number;
  rzRush: number;
  rzTgt: number;
}

export type NewsFlag = 'arrow_up' | 'arrow_down';

export interface PlayerUsageShares {
  snapShare: number;
  rushShare: number;
  targetShare: number;
  rzRushShare: number;
  rzTargetShare: number;
}

export interface Weather {
  windMph: number;
  precip: boolean;
}

export interface MatchupMetrics {
  teamPassYardsProj: number;
  teamRushYardsProj: number;
  eliteRunD: boolean;
  wr1VsEliteCb: boolean;
  passRushEdge: boolean;
  isDivisional: boolean;
}

/**
 * Sparse matchup signals. Only the recognised keys affect output;
 * unknown keys are ignored and missing keys read as false.
 */
export type MatchupFeatures = Readonly<Record<string, boolean | number | undefined>>;

export type ScenarioName = 'normal' | 'wr1_bracket' | 'rb_erased' | 'ol_collapse';

export type ScenarioProbabilities = Record<ScenarioName, number>;

export interface PlayerProjection {
  meanYards: number;
  floorYards: number;
  /** null when the player has no target share */
  meanReceptions: number | null;
  floorReceptions: number | null;
  meanTds: number;
  floorTds: number;
}
