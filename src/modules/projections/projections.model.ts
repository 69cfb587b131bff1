import {
  DeclaredLineup,
  LineupSlot,
  PlayerProjection,
  StarterLineup,
  StarterResolutionPolicy,
} from '../../domain/projection';
import { ErrorCodeType } from '../../utils/exceptions';

export interface ProjectionServiceOptions {
  starterPolicy: StarterResolutionPolicy;
  renormalizeRedZone: boolean;
  /** Per-call timeout for every sports data fetch */
  fetchTimeoutMs: number;
}

export interface TeamProjectionRequest {
  team: string;
  opponent: string;
  week: number;
  starters?: DeclaredLineup;
}

export interface TeamProjectionResult {
  team: string;
  opponent: string;
  week: number;
  starters: StarterLineup;
  /** Keyed by resolved player name */
  projections: Record<string, PlayerProjection>;
  /** Filled slots left out because the player had no usage record */
  omittedSlots: LineupSlot[];
}

export interface GameSideRequest {
  team: string;
  starters?: DeclaredLineup;
}

export interface GameProjectionRequest {
  season?: number;
  week: number;
  home: GameSideRequest;
  away: GameSideRequest;
}

export type TeamProjectionOutcome =
  | { status: 'ok'; result: TeamProjectionResult }
  | { status: 'error'; team: string; error: { code: ErrorCodeType; message: string } };

export interface GameProjectionResult {
  season?: number;
  week: number;
  home: TeamProjectionOutcome;
  away: TeamProjectionOutcome;
}

export function playerProjectionToResponse(projection: PlayerProjection) {
  return {
    mean_yards: projection.meanYards,
    floor_yards: projection.floorYards,
    mean_receptions: projection.meanReceptions,
    floor_receptions: projection.floorReceptions,
    mean_tds: projection.meanTds,
    floor_tds: projection.floorTds,
  };
}

export function teamProjectionToResponse(result: TeamProjectionResult) {
  const projections = Object.fromEntries(
    Object.entries(result.projections).map(([player, projection]) => [
      player,
      playerProjectionToResponse(projection),
    ])
  );

  return {
    team: result.team,
    opponent: result.opponent,
    week: result.week,
    starters: { ...result.starters },
    projections,
    omitted_slots: result.omittedSlots,
  };
}

export function teamOutcomeToResponse(outcome: TeamProjectionOutcome) {
  if (outcome.status === 'error') {
    return { status: outcome.status, team: outcome.team, error: outcome.error };
  }
  return { status: outcome.status, ...teamProjectionToResponse(outcome.result) };
}

export function gameProjectionToResponse(result: GameProjectionResult) {
  return {
    season: result.season ?? null,
    week: result.week,
    home: teamOutcomeToResponse(result.home),
    away: teamOutcomeToResponse(result.away),
  };
}
