/**
 * Provider-agnostic DTOs and payload schemas for sports data ingestion.
 * The DTO shapes are the projection engine's own input types; the schemas
 * guard every payload before it reaches the engine.
 */
import { z } from 'zod';
import { UpstreamDataException } from '../../utils/exceptions';

export type {
  DepthChart,
  MatchupMetrics,
  NewsFlag,
  RoleUsageRecord,
  Weather,
} from '../../domain/projection';

export const depthChartSchema = z.record(z.string(), z.array(z.string().trim().min(1)));

export const roleUsageRecordSchema = z.object({
  snapPct: z.number().min(0).max(1),
  rushAtt: z.number().int().nonnegative(),
  targets: z.number().int().nonnegative(),
  rzRush: z.number().int().nonnegative(),
  rzTgt: z.number().int().nonnegative(),
});

export const recentUsageSchema = z.record(z.string(), roleUsageRecordSchema);

export const newsFlagSchema = z.enum(['arrow_up', 'arrow_down']);

/** Players without news may be sent as null; they are dropped */
export const newsFlagsSchema = z
  .record(z.string(), newsFlagSchema.nullable())
  .transform((flags) => {
    const result: Record<string, z.infer<typeof newsFlagSchema>> = {};
    for (const [player, flag] of Object.entries(flags)) {
      if (flag) result[player] = flag;
    }
    return result;
  });

export const matchupMetricsSchema = z.object({
  teamPassYardsProj: z.number().nonnegative(),
  teamRushYardsProj: z.number().nonnegative(),
  eliteRunD: z.boolean().default(false),
  wr1VsEliteCb: z.boolean().default(false),
  passRushEdge: z.boolean().default(false),
  isDivisional: z.boolean().default(false),
});

export const weatherSchema = z.object({
  windMph: z.number().int().nonnegative(),
  precip: z.boolean().default(false),
});

/**
 * Parse a provider payload, turning schema failures into an UpstreamDataException
 * that names the first offending path.
 */
export function parseProviderPayload<S extends z.ZodTypeAny>(
  schema: S,
  payload: unknown,
  context: { providerId: string; operation: string; team?: string }
): z.output<S> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const issue = result.error.issues[0];
    const detail = issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid payload';
    throw UpstreamDataException.malformed(context.providerId, context.operation, detail, context.team);
  }
  return result.data;
}
