import {
  DepthChart,
  MatchupMetrics,
  NewsFlag,
  RoleUsageRecord,
  Weather,
} from '../../domain/projection';
import { ISportsDataProvider } from '../../integrations/shared/sports-data-provider.interface';

export interface TeamFixture {
  depthChart: DepthChart;
  recentUsage: Record<string, RoleUsageRecord>;
  newsFlags: Record<string, NewsFlag>;
  matchupMetrics: MatchupMetrics;
  weather: Weather;
}

export function usage(overrides: Partial<RoleUsageRecord> = {}): RoleUsageRecord {
  return { snapPct: 0.5, rushAtt: 0, targets: 0, rzRush: 0, rzTgt: 0, ...overrides };
}

/**
 * Round-number team: 100 rushes, 100 targets, 10 red-zone rushes, 10 red-zone targets.
 * W3 is on the chart but has no usage record.
 */
export function makeTeamFixture(overrides: Partial<TeamFixture> = {}): TeamFixture {
  return {
    depthChart: {
      QB: ['Q'],
      RB: ['R1', 'R2'],
      WR: ['W1', 'W2', 'W3'],
      TE: ['T1'],
    },
    recentUsage: {
      Q: usage({ snapPct: 1 }),
      R1: usage({ snapPct: 0.6, rushAtt: 60, targets: 10, rzRush: 6 }),
      R2: usage({ snapPct: 0.4, rushAtt: 40, rzRush: 4 }),
      W1: usage({ snapPct: 0.9, targets: 40, rzTgt: 5 }),
      W2: usage({ snapPct: 0.8, targets: 30, rzTgt: 3 }),
      T1: usage({ snapPct: 0.7, targets: 20, rzTgt: 2 }),
    },
    newsFlags: {},
    matchupMetrics: {
      teamPassYardsProj: 250,
      teamRushYardsProj: 100,
      eliteRunD: false,
      wr1VsEliteCb: false,
      passRushEdge: false,
      isDivisional: false,
    },
    weather: { windMph: 0, precip: false },
    ...overrides,
  };
}

/**
 * In-memory stand-in for a sports data source
 */
export class FakeSportsDataProvider implements ISportsDataProvider {
  readonly providerId = 'fake';

  constructor(private readonly teams: Record<string, TeamFixture>) {}

  async fetchDepthChart(team: string, _week: number, _signal?: AbortSignal): Promise<DepthChart> {
    return this.team(team).depthChart;
  }

  async fetchRecentUsage(team: string, _week: number, _signal?: AbortSignal): Promise<Record<string, RoleUsageRecord>> {
    return this.team(team).recentUsage;
  }

  async fetchNewsFlags(team: string, _week: number, _signal?: AbortSignal): Promise<Record<string, NewsFlag>> {
    return this.team(team).newsFlags;
  }

  async fetchMatchupMetrics(team: string, _week: number, _signal?: AbortSignal): Promise<MatchupMetrics> {
    return this.team(team).matchupMetrics;
  }

  async fetchWeather(team: string, _week: number, _signal?: AbortSignal): Promise<Weather> {
    return this.team(team).weather;
  }

  private team(team: string): TeamFixture {
    const fixture = this.teams[team];
    if (!fixture) throw new Error(`Unknown team ${team}`);
    return fixture;
  }
}
