/**
 * Player Projection Calculator
 *
 * Turns a pre-allocated base yardage figure into mean and TC-floor projections
 * for yards, receptions and touchdowns. Pure arithmetic; callers guarantee
 * non-negative usage shares.
 */

import { applyRivalryFactor, applyWeatherFactor } from './environment';
import { scenarioProbabilities } from './scenarios';
import { MatchupFeatures, PlayerProjection, PlayerUsageShares, Weather } from './types';

export const PROJECTION_CONSTANTS = {
  /** Yards shaved per unit of bracket / erased-back probability */
  wr1BracketShrink: 0.15,
  rbErasedShrink: 0.15,
  teamPassAttempts: 40,
  catchRate: 0.65,
  tdBaseRate: 0.3,
  yardsFloorRatio: 0.85,
  receptionsFloorRatio: 0.85,
  tdFloorRatio: 0.7,
} as const;

export interface PlayerProjectionInput {
  /** Raw yardage allocation (team total × usage share) */
  baseYards: number;
  usage: PlayerUsageShares;
  /** Global matchup flags plus role flags such as is_wr1 / is_rb1 */
  features: MatchupFeatures;
  weather: Weather;
  rivalry: boolean;
  /** Selects the passing branch of the weather adjustment */
  isPassStat: boolean;
}

export function projectPlayer(input: PlayerProjectionInput): PlayerProjection {
  const { baseYards, usage, features, weather, rivalry, isPassStat } = input;
  const c = PROJECTION_CONSTANTS;
  const scenarios = scenarioProbabilities(features);

  // Order matters: each step scales the running value
  let adjusted = baseYards;
  if (features.is_wr1 && scenarios.wr1_bracket > 0) {
    adjusted *= 1 - c.wr1BracketShrink * scenarios.wr1_bracket;
  }
  if (features.is_rb1 && scenarios.rb_erased > 0) {
    adjusted *= 1 - c.rbErasedShrink * scenarios.rb_erased;
  }
  adjusted = applyWeatherFactor(adjusted, weather, isPassStat);
  adjusted = applyRivalryFactor(adjusted, rivalry);

  let meanReceptions: number | null = null;
  let floorReceptions: number | null = null;
  if (usage.targetShare > 0) {
    meanReceptions = c.teamPassAttempts * usage.targetShare * c.catchRate;
    floorReceptions = meanReceptions * c.receptionsFloorRatio;
  }

  // One flat TD rate scaled by red-zone involvement; rushing and receiving TDs are not split
  const meanTds = c.tdBaseRate * (1 + usage.rzRushShare + usage.rzTargetShare);

  return {
    meanYards: adjusted,
    floorYards: adjusted * c.yardsFloorRatio,
    meanReceptions,
    floorReceptions,
    meanTds,
    floorTds: meanTds * c.tdFloorRatio,
  };
}
