import { projectPlayer, PlayerProjectionInput } from '../projection/player-projection';
import { PlayerUsageShares } from '../projection/types';

function shares(overrides: Partial<PlayerUsageShares> = {}): PlayerUsageShares {
  return {
    snapShare: 0.8,
    rushShare: 0,
    targetShare: 0,
    rzRushShare: 0,
    rzTargetShare: 0,
    ...overrides,
  };
}

function input(overrides: Partial<PlayerProjectionInput> = {}): PlayerProjectionInput {
  return {
    baseYards: 100,
    usage: shares(),
    features: {},
    weather: { windMph: 0, precip: false },
    rivalry: false,
    isPassStat: false,
    ...overrides,
  };
}

describe('projectPlayer', () => {
  describe('yards', () => {
    it('projects 96.0 mean and 81.6 floor for a calm rivalry game', () => {
      const projection = projectPlayer(input({ rivalry: true }));

      expect(projection.meanYards).toBeCloseTo(96.0, 10);
      expect(projection.floorYards).toBeCloseTo(81.6, 10);
    });

    it('shrinks a WR1 by 1.5% with the baseline bracket probability', () => {
      const projection = projectPlayer(input({ features: { is_wr1: true }, isPassStat: true }));

      expect(projection.meanYards).toBeCloseTo(98.5, 10);
    });

    it('shrinks a WR1 by 3% against an elite corner', () => {
      const projection = projectPlayer(
        input({ features: { is_wr1: true, wr1_vs_elite_cb: true }, isPassStat: true })
      );

      expect(projection.meanYards).toBeCloseTo(97, 10);
    });

    it('shrinks an RB1 by 3% against an elite run defense', () => {
      const projection = projectPlayer(input({ features: { is_rb1: true, elite_run_d: true } }));

      expect(projection.meanYards).toBeCloseTo(97, 10);
    });

    it('does not shrink players without a role flag', () => {
      const projection = projectPlayer(
        input({ features: { wr1_vs_elite_cb: true, elite_run_d: true }, isPassStat: true })
      );

      expect(projection.meanYards).toBe(100);
    });

    it('applies scenario shrink, then weather, then rivalry', () => {
      const projection = projectPlayer(
        input({
          features: { is_wr1: true, wr1_vs_elite_cb: true },
          weather: { windMph: 18, precip: false },
          rivalry: true,
          isPassStat: true,
        })
      );

      // 100 x 0.97 x 0.93 x 0.96
      expect(projection.meanYards).toBeCloseTo(86.6016, 10);
      expect(projection.floorYards).toBeCloseTo(86.6016 * 0.85, 10);
    });
  });

  describe('receptions', () => {
    it('estimates receptions from target share', () => {
      const projection = projectPlayer(input({ usage: shares({ targetShare: 0.25 }) }));

      expect(projection.meanReceptions).toBeCloseTo(6.5, 10);
      expect(projection.floorReceptions).toBeCloseTo(5.525, 10);
    });

    it('leaves receptions absent without a target share', () => {
      const projection = projectPlayer(input({ usage: shares({ rushShare: 0.7 }) }));

      expect(projection.meanReceptions).toBeNull();
      expect(projection.floorReceptions).toBeNull();
    });
  });

  describe('touchdowns', () => {
    it('scales the base rate by red-zone involvement', () => {
      const projection = projectPlayer(
        input({ usage: shares({ rzRushShare: 0.2, rzTargetShare: 0.3 }) })
      );

      expect(projection.meanTds).toBeCloseTo(0.45, 10);
      expect(projection.floorTds).toBeCloseTo(0.315, 10);
    });

    it('uses the flat 0.3 rate with no red-zone usage', () => {
      const projection = projectPlayer(input());

      expect(projection.meanTds).toBeCloseTo(0.3, 10);
      expect(projection.floorTds).toBeCloseTo(0.21, 10);
    });
  });

  it('returns identical output for identical input', () => {
    const args = input({
      baseYards: 143.2,
      usage: shares({ targetShare: 0.31, rzTargetShare: 0.4 }),
      features: { is_wr1: true, wr1_vs_elite_cb: true },
      weather: { windMph: 16, precip: true },
      isPassStat: true,
    });

    expect(projectPlayer(args)).toEqual(projectPlayer(args));
  });

  it('never puts a floor above its mean', () => {
    const cases: PlayerProjectionInput[] = [
      input(),
      input({ baseYards: 0 }),
      input({ baseYards: 312, isPassStat: true, weather: { windMph: 25, precip: true } }),
      input({ usage: shares({ targetShare: 0.9, rzRushShare: 1, rzTargetShare: 1 }) }),
      input({ features: { is_rb1: true, elite_run_d: true }, rivalry: true }),
    ];

    for (const args of cases) {
      const p = projectPlayer(args);
      expect(p.floorYards).toBeLessThanOrEqual(p.meanYards);
      expect(p.floorTds).toBeLessThanOrEqual(p.meanTds);
      if (p.meanReceptions !== null && p.floorReceptions !== null) {
        expect(p.floorReceptions).toBeLessThanOrEqual(p.meanReceptions);
      }
    }
  });
});
