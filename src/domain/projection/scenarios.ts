import { MatchupFeatures, ScenarioProbabilities } from './types';

/**
 * Game-script scenario probabilities from matchup flags.
 * Each value is an independent shrinkage trigger, so they are not normalized.
 */
export function scenarioProbabilities(features: MatchupFeatures): ScenarioProbabilities {
  return {
    normal: 0.5,
    wr1_bracket: features.wr1_vs_elite_cb ? 0.2 : 0.1,
    rb_erased: features.elite_run_d ? 0.2 : 0.1,
    ol_collapse: features.pass_rush_edge ? 0.1 : 0.05,
  };
}
