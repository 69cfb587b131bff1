import { z } from 'zod';
import { MAX_WEEK } from './projections.service';
import { SORT_COLUMNS, SortColumn } from './projection-table';

const teamCode = z
  .string()
  .trim()
  .min(2, 'Team code must be at least 2 characters')
  .max(10, 'Team code must be at most 10 characters');

const playerName = z.string().trim().max(100).nullable().optional();

// ========== Declared starters (blank slots are filled from the depth chart) ==========
export const starterLineupSchema = z
  .object({
    qb: playerName,
    rb1: playerName,
    rb2: playerName,
    wr1: playerName,
    wr2: playerName,
    wr3: playerName,
    te1: playerName,
    te2: playerName,
  })
  .strict();

const week = z.coerce
  .number()
  .int('Week must be an integer')
  .min(1, 'Week must be at least 1')
  .max(MAX_WEEK, `Week must be at most ${MAX_WEEK}`);

// ========== Single team projection ==========
export const teamProjectionSchema = z
  .object({
    team: teamCode,
    opponent: teamCode,
    week,
    starters: starterLineupSchema.optional(),
  })
  .refine((body) => body.team.toUpperCase() !== body.opponent.toUpperCase(), {
    message: 'Team and opponent must differ',
    path: ['opponent'],
  });

export type TeamProjectionInput = z.infer<typeof teamProjectionSchema>;

// ========== Full game projection ==========
const gameSideSchema = z.object({
  team: teamCode,
  starters: starterLineupSchema.optional(),
});

export const gameProjectionSchema = z
  .object({
    season: z.coerce.number().int().min(2000).max(2100).optional(),
    week,
    home: gameSideSchema,
    away: gameSideSchema,
  })
  .refine((body) => body.home.team.toUpperCase() !== body.away.team.toUpperCase(), {
    message: 'Home and away teams must differ',
    path: ['away', 'team'],
  });

export type GameProjectionInput = z.infer<typeof gameProjectionSchema>;

// ========== Export options ==========
const sortColumn = z.custom<SortColumn>(
  (value) => typeof value === 'string' && SORT_COLUMNS.some((column) => column === value),
  { message: `sort must be one of: ${SORT_COLUMNS.join(', ')}` }
);

export const projectionExportQuerySchema = z.object({
  format: z.enum(['json', 'csv']).default('json'),
  sort: sortColumn.optional(),
  direction: z.enum(['asc', 'desc']).optional(),
});

export type ProjectionExportQuery = z.infer<typeof projectionExportQuerySchema>;
