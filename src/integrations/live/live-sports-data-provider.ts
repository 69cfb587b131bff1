import { z } from 'zod';
import { ISportsDataProvider } from '../shared/sports-data-provider.interface';
import {
  DepthChart,
  MatchupMetrics,
  NewsFlag,
  RoleUsageRecord,
  Weather,
  depthChartSchema,
  newsFlagsSchema,
  parseProviderPayload,
} from '../shared/sports-data-provider.types';
import { ApiMatchupMetrics, ApiUsageRecord, ApiWeather, SportsDataApiClient } from './sports-data-api-client';

const apiUsageSchema: z.ZodType<ApiUsageRecord> = z.object({
  snap_pct: z.number().min(0).max(1),
  rush_att: z.number().int().nonnegative(),
  targets: z.number().int().nonnegative(),
  rz_rush: z.number().int().nonnegative(),
  rz_tgt: z.number().int().nonnegative(),
});

const apiMatchupSchema: z.ZodType<ApiMatchupMetrics> = z.object({
  team_pass_yards_proj: z.number().nonnegative(),
  team_rush_yards_proj: z.number().nonnegative(),
  elite_run_d: z.boolean().optional(),
  wr1_vs_elite_cb: z.boolean().optional(),
  pass_rush_edge: z.boolean().optional(),
  is_divisional: z.boolean().optional(),
});

const apiWeatherSchema: z.ZodType<ApiWeather> = z.object({
  wind_mph: z.number().int().nonnegative(),
  precip: z.boolean().optional(),
});

/**
 * Live implementation of ISportsDataProvider
 *
 * Wraps SportsDataApiClient and maps the API's snake_case payloads into the
 * domain DTOs. All API-specific knowledge stays in this file and the client.
 */
export class LiveSportsDataProvider implements ISportsDataProvider {
  readonly providerId = 'live';

  constructor(private readonly client: SportsDataApiClient) {}

  async fetchDepthChart(team: string, week: number, signal?: AbortSignal): Promise<DepthChart> {
    const body = await this.client.fetchTeamResource('depth-chart', team, week, signal);
    return parseProviderPayload(depthChartSchema, body, this.context('fetchDepthChart', team));
  }

  async fetchRecentUsage(team: string, week: number, signal?: AbortSignal): Promise<Record<string, RoleUsageRecord>> {
    const body = await this.client.fetchTeamResource('usage', team, week, signal);
    const usage = parseProviderPayload(
      z.record(z.string(), apiUsageSchema),
      body,
      this.context('fetchRecentUsage', team)
    );

    const result: Record<string, RoleUsageRecord> = {};
    for (const [player, record] of Object.entries(usage)) {
      result[player] = this.mapUsageRecord(record);
    }
    return result;
  }

  async fetchNewsFlags(team: string, week: number, signal?: AbortSignal): Promise<Record<string, NewsFlag>> {
    const body = await this.client.fetchTeamResource('news-flags', team, week, signal);
    return parseProviderPayload(newsFlagsSchema, body, this.context('fetchNewsFlags', team));
  }

  async fetchMatchupMetrics(team: string, week: number, signal?: AbortSignal): Promise<MatchupMetrics> {
    const body = await this.client.fetchTeamResource('matchup', team, week, signal);
    const metrics = parseProviderPayload(apiMatchupSchema, body, this.context('fetchMatchupMetrics', team));
    return this.mapMatchupMetrics(metrics);
  }

  async fetchWeather(team: string, week: number, signal?: AbortSignal): Promise<Weather> {
    const body = await this.client.fetchTeamResource('weather', team, week, signal);
    const weather = parseProviderPayload(apiWeatherSchema, body, this.context('fetchWeather', team));
    return {
      windMph: weather.wind_mph,
      precip: weather.precip ?? false,
    };
  }

  private context(operation: string, team: string) {
    return { providerId: this.providerId, operation, team };
  }

  private mapUsageRecord(record: ApiUsageRecord): RoleUsageRecord {
    return {
      snapPct: record.snap_pct,
      rushAtt: record.rush_att,
      targets: record.targets,
      rzRush: record.rz_rush,
      rzTgt: record.rz_tgt,
    };
  }

  private mapMatchupMetrics(metrics: ApiMatchupMetrics): MatchupMetrics {
    return {
      teamPassYardsProj: metrics.team_pass_yards_proj,
      teamRushYardsProj: metrics.team_rush_yards_proj,
      eliteRunD: metrics.elite_run_d ?? false,
      wr1VsEliteCb: metrics.wr1_vs_elite_cb ?? false,
      passRushEdge: metrics.pass_rush_edge ?? false,
      isDivisional: metrics.is_divisional ?? false,
    };
  }
}
