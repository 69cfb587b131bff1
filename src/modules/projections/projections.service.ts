import { z } from 'zod';
import {
  LINEUP_SLOTS,
  LINEUP_SLOT_ORDER,
  LineupSlot,
  MatchupFeatures,
  MatchupMetrics,
  PlayerProjection,
  PlayerUsageShares,
  StarterLineup,
  deriveUsageShares,
  projectPlayer,
  resolveStarters,
} from '../../domain/projection';
import { ISportsDataProvider } from '../../integrations/shared/sports-data-provider.interface';
import {
  depthChartSchema,
  matchupMetricsSchema,
  newsFlagsSchema,
  parseProviderPayload,
  recentUsageSchema,
  weatherSchema,
} from '../../integrations/shared/sports-data-provider.types';
import { logger } from '../../config/logger.config';
import {
  AppException,
  ErrorCode,
  NotFoundException,
  UpstreamDataException,
  ValidationException,
} from '../../utils/exceptions';
import {
  GameProjectionRequest,
  GameProjectionResult,
  ProjectionServiceOptions,
  TeamProjectionOutcome,
  TeamProjectionRequest,
  TeamProjectionResult,
} from './projections.model';

export const MAX_WEEK = 22;

/** Share of team rushing yards credited to the quarterback */
export const QB_RUSH_SHARE = 0.15;
/** Weight on a running back's receiving allocation */
export const RB_RECEIVING_WEIGHT = 0.25;

type SlotRole = 'qb' | 'rb' | 'receiver';

const SLOT_ROLES: Readonly<Record<LineupSlot, SlotRole>> = {
  qb: 'qb',
  rb1: 'rb',
  rb2: 'rb',
  wr1: 'receiver',
  wr2: 'receiver',
  wr3: 'receiver',
  te1: 'receiver',
  te2: 'receiver',
};

/**
 * Raw yardage allocation for a slot before any adjustment.
 * Quarterbacks and receivers project passing-derived yards; backs do not.
 */
export function baseYardsForSlot(
  slot: LineupSlot,
  usage: PlayerUsageShares,
  matchup: Pick<MatchupMetrics, 'teamPassYardsProj' | 'teamRushYardsProj'>
): { baseYards: number; isPassStat: boolean } {
  const pass = matchup.teamPassYardsProj;
  const rush = matchup.teamRushYardsProj;

  switch (SLOT_ROLES[slot]) {
    case 'qb':
      return { baseYards: pass + QB_RUSH_SHARE * rush, isPassStat: true };
    case 'rb':
      return {
        baseYards: rush * usage.rushShare + RB_RECEIVING_WEIGHT * pass * usage.targetShare,
        isPassStat: false,
      };
    case 'receiver':
      return { baseYards: pass * usage.targetShare, isPassStat: true };
  }
}

/** Global matchup flags plus the slot's own role flags */
export function featuresForSlot(slot: LineupSlot, matchup: MatchupMetrics): MatchupFeatures {
  return {
    is_wr1: slot === 'wr1',
    is_rb1: slot === 'rb1',
    wr1_vs_elite_cb: matchup.wr1VsEliteCb,
    elite_run_d: matchup.eliteRunD,
    pass_rush_edge: matchup.passRushEdge,
    is_divisional: matchup.isDivisional,
  };
}

export class ProjectionService {
  constructor(
    private readonly provider: ISportsDataProvider,
    private readonly options: ProjectionServiceOptions
  ) {}

  get providerId(): string {
    return this.provider.providerId;
  }

  get starterPolicy(): ProjectionServiceOptions['starterPolicy'] {
    return this.options.starterPolicy;
  }

  /**
   * Project every filled starter slot for one team.
   *
   * depth chart -> starters -> usage + news -> shares -> matchup + weather -> per-slot projection
   *
   * Any provider failure aborts the whole team; starters without a usage record
   * are omitted and reported in `omittedSlots`.
   */
  async buildTeamProjections(request: TeamProjectionRequest): Promise<TeamProjectionResult> {
    const { team, opponent, week } = this.validateRequest(request);
    logger.info('Building team projections', { team, opponent, week, provider: this.provider.providerId });

    const depthChart = await this.fetch('fetchDepthChart', team, depthChartSchema, (signal) =>
      this.provider.fetchDepthChart(team, week, signal)
    );
    const declared = request.starters ?? {};
    const starters = resolveStarters(depthChart, declared, this.options.starterPolicy);
    this.logSubstitutions(team, declared, starters);

    const usageRecords = await this.fetch('fetchRecentUsage', team, recentUsageSchema, (signal) =>
      this.provider.fetchRecentUsage(team, week, signal)
    );
    const newsFlags = await this.fetch('fetchNewsFlags', team, newsFlagsSchema, (signal) =>
      this.provider.fetchNewsFlags(team, week, signal)
    );
    const usage = deriveUsageShares(usageRecords, newsFlags, {
      renormalizeRedZone: this.options.renormalizeRedZone,
    });

    const matchup = await this.fetch('fetchMatchupMetrics', team, matchupMetricsSchema, (signal) =>
      this.provider.fetchMatchupMetrics(team, week, signal)
    );
    const weather = await this.fetch('fetchWeather', team, weatherSchema, (signal) =>
      this.provider.fetchWeather(team, week, signal)
    );

    const projections = new Map<string, PlayerProjection>();
    const handled = new Set<string>();
    const omittedSlots: LineupSlot[] = [];

    for (const slot of LINEUP_SLOT_ORDER) {
      const player = starters[slot];
      if (player === null) continue;

      // A fallback can land a player in two slots; the first (higher) slot wins
      if (handled.has(player)) continue;
      handled.add(player);

      const shares = Object.hasOwn(usage, player) ? usage[player] : undefined;
      if (!shares) {
        logger.warn('Starter has no usage record, omitting', { team, slot, player });
        omittedSlots.push(slot);
        continue;
      }

      const { baseYards, isPassStat } = baseYardsForSlot(slot, shares, matchup);
      projections.set(
        player,
        projectPlayer({
          baseYards,
          usage: shares,
          features: featuresForSlot(slot, matchup),
          weather,
          rivalry: matchup.isDivisional,
          isPassStat,
        })
      );
    }

    logger.info('Team projections built', {
      team,
      week,
      players: projections.size,
      omitted: omittedSlots.length,
    });

    return {
      team,
      opponent,
      week,
      starters,
      projections: Object.fromEntries(projections),
      omittedSlots,
    };
  }

  /**
   * Project both sides of a game. A failure on one side is reported for that
   * side only; the other side is still returned.
   */
  async buildGameProjections(request: GameProjectionRequest): Promise<GameProjectionResult> {
    const home = await this.settleTeam({
      team: request.home.team,
      opponent: request.away.team,
      week: request.week,
      starters: request.home.starters,
    });
    const away = await this.settleTeam({
      team: request.away.team,
      opponent: request.home.team,
      week: request.week,
      starters: request.away.starters,
    });

    return { season: request.season, week: request.week, home, away };
  }

  private async settleTeam(request: TeamProjectionRequest): Promise<TeamProjectionOutcome> {
    try {
      return { status: 'ok', result: await this.buildTeamProjections(request) };
    } catch (error) {
      if (error instanceof AppException) {
        logger.error('Team projection failed', {
          team: request.team,
          code: error.errorCode,
          message: error.message,
        });
        return {
          status: 'error',
          team: request.team,
          error: { code: error.errorCode, message: error.message },
        };
      }

      logger.error('Team projection failed unexpectedly', {
        team: request.team,
        error: error instanceof Error ? error.message : String(error),
        stack: error instanceof Error ? error.stack : undefined,
      });
      return {
        status: 'error',
        team: request.team,
        error: { code: ErrorCode.INTERNAL_ERROR, message: 'Projection failed for this team' },
      };
    }
  }

  private validateRequest(request: TeamProjectionRequest): TeamProjectionRequest {
    const team = request.team.trim();
    const opponent = request.opponent.trim();

    if (!team || !opponent) {
      throw new ValidationException('Team and opponent are required');
    }
    if (team.toUpperCase() === opponent.toUpperCase()) {
      throw new ValidationException(`Team ${team} cannot play itself`);
    }
    if (!Number.isInteger(request.week) || request.week < 1 || request.week > MAX_WEEK) {
      throw new ValidationException(`Week must be an integer between 1 and ${MAX_WEEK}, got ${request.week}`);
    }

    return { ...request, team, opponent };
  }

  /**
   * Call the provider under a timeout and validate what comes back.
   * The call's signal is aborted once the deadline passes or the call settles,
   * so a provider never keeps retrying for a team that has already failed.
   * A missing team passes through as NotFoundException; every other failure
   * becomes an UpstreamDataException scoped to the team.
   */
  private async fetch<S extends z.ZodTypeAny>(
    operation: string,
    team: string,
    schema: S,
    call: (signal: AbortSignal) => Promise<unknown>
  ): Promise<z.output<S>> {
    const providerId = this.provider.providerId;
    const timeoutMs = this.options.fetchTimeoutMs;
    const controller = new AbortController();
    let timer: NodeJS.Timeout | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(UpstreamDataException.timeout(providerId, operation, timeoutMs, team));
        controller.abort();
      }, timeoutMs);
    });

    try {
      const payload = await Promise.race([call(controller.signal), timeout]);
      return parseProviderPayload(schema, payload, { providerId, operation, team });
    } catch (error) {
      if (error instanceof NotFoundException) throw error;
      throw UpstreamDataException.fromError(providerId, operation, error, team);
    } finally {
      clearTimeout(timer);
      controller.abort();
    }
  }

  private logSubstitutions(
    team: string,
    declared: NonNullable<TeamProjectionRequest['starters']>,
    starters: StarterLineup
  ): void {
    for (const slot of LINEUP_SLOT_ORDER) {
      const requested = declared[slot]?.trim() || null;
      const resolved = starters[slot];
      if (requested !== resolved) {
        logger.info('Starter filled from depth chart', {
          team,
          slot,
          position: LINEUP_SLOTS[slot].position,
          requested,
          resolved,
        });
      }
    }
  }
}
