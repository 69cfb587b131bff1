import { promises as fs } from 'fs';
import path from 'path';
import { z } from 'zod';
import { ISportsDataProvider } from '../shared/sports-data-provider.interface';
import {
  DepthChart,
  MatchupMetrics,
  NewsFlag,
  RoleUsageRecord,
  Weather,
  depthChartSchema,
  matchupMetricsSchema,
  newsFlagsSchema,
  parseProviderPayload,
  recentUsageSchema,
  weatherSchema,
} from '../shared/sports-data-provider.types';
import { NotFoundException } from '../../utils/exceptions';

const teamSlateSchema = z.object({
  depthChart: depthChartSchema,
  recentUsage: recentUsageSchema,
  newsFlags: newsFlagsSchema.default({}),
  matchupMetrics: matchupMetricsSchema,
  weather: weatherSchema,
});

const slateFileSchema = z.object({
  teams: z.record(z.string(), teamSlateSchema),
});

type TeamSlate = z.infer<typeof teamSlateSchema>;

/**
 * Offline implementation of ISportsDataProvider
 *
 * Serves a hand-maintained slate file so the service runs without API credentials.
 * The slate is keyed by team code and is week-agnostic. The file is re-read on every
 * call; nothing is cached between projections.
 */
export class OfflineSportsDataProvider implements ISportsDataProvider {
  readonly providerId = 'offline';
  private readonly slatePath: string;

  constructor(slatePath: string) {
    this.slatePath = path.resolve(slatePath);
  }

  async fetchDepthChart(team: string, _week: number, signal?: AbortSignal): Promise<DepthChart> {
    return (await this.loadTeam(team, 'depthChart', signal)).depthChart;
  }

  async fetchRecentUsage(team: string, _week: number, signal?: AbortSignal): Promise<Record<string, RoleUsageRecord>> {
    return (await this.loadTeam(team, 'recentUsage', signal)).recentUsage;
  }

  async fetchNewsFlags(team: string, _week: number, signal?: AbortSignal): Promise<Record<string, NewsFlag>> {
    return (await this.loadTeam(team, 'newsFlags', signal)).newsFlags;
  }

  async fetchMatchupMetrics(team: string, _week: number, signal?: AbortSignal): Promise<MatchupMetrics> {
    return (await this.loadTeam(team, 'matchupMetrics', signal)).matchupMetrics;
  }

  async fetchWeather(team: string, _week: number, signal?: AbortSignal): Promise<Weather> {
    return (await this.loadTeam(team, 'weather', signal)).weather;
  }

  /**
   * Read and validate the slate, then pick out one team
   */
  private async loadTeam(team: string, operation: string, signal?: AbortSignal): Promise<TeamSlate> {
    const raw = await fs.readFile(this.slatePath, { encoding: 'utf-8', signal });
    let json: unknown;
    try {
      json = JSON.parse(raw);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new Error(`Slate file ${this.slatePath} is not valid JSON: ${reason}`);
    }

    const slate = parseProviderPayload(slateFileSchema, json, {
      providerId: this.providerId,
      operation,
      team,
    });
    if (!Object.hasOwn(slate.teams, team)) {
      throw new NotFoundException(`Team ${team} is not in the offline slate`);
    }
    return slate.teams[team];
  }
}
