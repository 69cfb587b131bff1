import { DepthChart, MatchupMetrics, NewsFlag, RoleUsageRecord, Weather } from './sports-data-provider.types';

/**
 * Sports data provider interface
 * Every data source (offline slate file, live HTTP API, test fakes) implements this
 * contract so the projection service never cares where its inputs come from.
 *
 * Each method is a function of (team, week). Implementations return domain DTOs
 * and throw on failure; the projection service wraps failures as upstream errors.
 * The optional signal fires when the caller has given up on the call; implementations
 * stop any outstanding work (retries, reads) once it is aborted.
 */
export interface ISportsDataProvider {
  /** Provider identifier (e.g., 'offline', 'live') */
  readonly providerId: string;

  /**
   * Fetch the authoritative depth chart
   * @returns Position code -> player names, best first
   */
  fetchDepthChart(team: string, week: number, signal?: AbortSignal): Promise<DepthChart>;

  /**
   * Fetch trailing-window usage counts
   * @returns Player name -> usage record
   */
  fetchRecentUsage(team: string, week: number, signal?: AbortSignal): Promise<Record<string, RoleUsageRecord>>;

  /**
   * Fetch news-driven usage nudges
   * @returns Player name -> flag; players without news are absent
   */
  fetchNewsFlags(team: string, week: number, signal?: AbortSignal): Promise<Record<string, NewsFlag>>;

  /** Fetch team-level projected yardage and matchup signals */
  fetchMatchupMetrics(team: string, week: number, signal?: AbortSignal): Promise<MatchupMetrics>;

  /** Fetch game-time weather at the team's venue */
  fetchWeather(team: string, week: number, signal?: AbortSignal): Promise<Weather>;
}
