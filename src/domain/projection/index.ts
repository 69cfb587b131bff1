export {
  type Position,
  type DepthChart,
  type LineupSlot,
  type StarterLineup,
  type DeclaredLineup,
  type StarterResolutionPolicy,
  type RoleUsageRecord,
  type NewsFlag,
  type PlayerUsageShares,
  type Weather,
  type MatchupMetrics,
  type MatchupFeatures,
  type ScenarioName,
  type ScenarioProbabilities,
  type PlayerProjection,
} from './types';

export {
  deriveUsageShares,
  assertValidUsageRecord,
  newsMultiplier,
  NEWS_MULTIPLIERS,
  type DeriveUsageOptions,
} from './usage';

export { scenarioProbabilities } from './scenarios';

export {
  applyWeatherFactor,
  applyRivalryFactor,
  WIND_THRESHOLD_MPH,
  RIVALRY_FACTOR,
} from './environment';

export {
  projectPlayer,
  PROJECTION_CONSTANTS,
  type PlayerProjectionInput,
} from './player-projection';

export { resolveStarters, LINEUP_SLOTS, LINEUP_SLOT_ORDER } from './starters';
