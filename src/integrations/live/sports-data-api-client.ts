import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { logger } from '../../config/logger.config';

/** Usage counts as served by the data API */
export interface ApiUsageRecord {
  snap_pct: number;
  rush_att: number;
  targets: number;
  rz_rush: number;
  rz_tgt: number;
}

export interface ApiMatchupMetrics {
  team_pass_yards_proj: number;
  team_rush_yards_proj: number;
  elite_run_d?: boolean;
  wr1_vs_elite_cb?: boolean;
  pass_rush_edge?: boolean;
  is_divisional?: boolean;
}

export interface ApiWeather {
  wind_mph: number;
  precip?: boolean;
}

export type ApiResource = 'depth-chart' | 'usage' | 'news-flags' | 'matchup' | 'weather';

export interface SportsDataApiClientOptions {
  baseURL: string;
  apiKey?: string;
  timeoutMs: number;
  maxRetries?: number;
  baseDelayMs?: number;
  /** Swap the transport, e.g. for an in-process stand-in */
  adapter?: AxiosAdapter;
}

/** Network error codes that indicate transient failures worth retrying */
const TRANSIENT_NETWORK_CODES = new Set([
  'ECONNRESET',
  'ETIMEDOUT',
  'ECONNABORTED',
  'EPIPE',
  'ENOTFOUND',
  'ENETUNREACH',
  'EAI_AGAIN',
]);

/**
 * True for 5xx responses, timeouts and network-level errors.
 * 4xx responses are permanent and never retried.
 */
export function isTransientError(error: unknown): boolean {
  if (!axios.isAxiosError(error)) return false;

  if (error.code && TRANSIENT_NETWORK_CODES.has(error.code)) return true;
  if (error.message?.includes('timeout')) return true;

  const status = error.response?.status;
  return status !== undefined && status >= 500;
}

/** Wait out a retry delay, ending early if the signal aborts */
function backoff(delayMs: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, delayMs);
    signal?.addEventListener('abort', done, { once: true });
  });
}

export class SportsDataApiClient {
  private readonly client: AxiosInstance;
  private readonly maxRetries: number;
  private readonly baseDelayMs: number;

  constructor(options: SportsDataApiClientOptions) {
    this.maxRetries = options.maxRetries ?? 3;
    this.baseDelayMs = options.baseDelayMs ?? 500;
    this.client = axios.create({
      baseURL: options.baseURL,
      timeout: options.timeoutMs,
      headers: {
        Accept: 'application/json',
        ...(options.apiKey ? { 'X-API-Key': options.apiKey } : {}),
      },
      adapter: options.adapter,
    });
  }

  /**
   * Execute a request, retrying transient failures with exponential backoff
   * (base, 2x base, 4x base). Client errors are thrown immediately. Once the
   * signal is aborted no further attempt is made and a pending backoff ends early.
   */
  private async withRetry<T>(fn: () => Promise<T>, context: string, signal?: AbortSignal): Promise<T> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt <= this.maxRetries; attempt++) {
      if (signal?.aborted) break;
      try {
        return await fn();
      } catch (error) {
        if (attempt < this.maxRetries && isTransientError(error) && !signal?.aborted) {
          lastError = error;
          const delay = this.baseDelayMs * Math.pow(2, attempt);
          logger.warn('Sports data API transient error, retrying', {
            context,
            attempt: attempt + 1,
            maxRetries: this.maxRetries,
            delay,
            errorMessage: error instanceof Error ? error.message : String(error),
            status: axios.isAxiosError(error) ? error.response?.status : undefined,
          });
          await backoff(delay, signal);
        } else {
          throw error;
        }
      }
    }

    if (signal?.aborted) {
      logger.debug('Sports data API request abandoned by caller', { context });
      throw lastError ?? new Error(`Sports data API request aborted for ${context}`);
    }
    throw lastError ?? new Error(`Sports data API max retries exceeded for ${context}`);
  }

  /**
   * GET one per-team, per-week resource. The body is returned unvalidated.
   */
  async fetchTeamResource(
    resource: ApiResource,
    team: string,
    week: number,
    signal?: AbortSignal
  ): Promise<unknown> {
    const url = `/teams/${encodeURIComponent(team)}/weeks/${week}/${resource}`;
    return this.withRetry(
      async () => {
        try {
          const response = await this.client.get<unknown>(url, { signal });
          return response.data;
        } catch (error) {
          if (axios.isAxiosError(error) && !isTransientError(error)) {
            const status = error.response?.status;
            throw new Error(`Sports data ${resource} request failed${status ? ` (${status})` : ''}: ${error.message}`);
          }
          throw error;
        }
      },
      url,
      signal
    );
  }
}
