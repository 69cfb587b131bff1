import { Request, Response, NextFunction } from 'express';
import { ProjectionService } from './projections.service';
import {
  GameProjectionInput,
  ProjectionExportQuery,
  TeamProjectionInput,
  gameProjectionSchema,
  projectionExportQuerySchema,
  teamProjectionSchema,
} from './projections.schemas';
import {
  GameProjectionResult,
  gameProjectionToResponse,
  teamProjectionToResponse,
} from './projections.model';
import {
  ProjectionRow,
  projectionCsvFileName,
  projectionRowsToCsv,
  sortProjectionRows,
  toProjectionRows,
} from './projection-table';

/** Lists the sides of a game export that failed, as TEAM:ERROR_CODE pairs */
export const PROJECTION_ERRORS_HEADER = 'X-Projection-Errors';

export class ProjectionController {
  constructor(private readonly projectionService: ProjectionService) {}

  getTeamProjections = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input: TeamProjectionInput = teamProjectionSchema.parse(req.body);
      const query: ProjectionExportQuery = projectionExportQuerySchema.parse(req.query);

      const result = await this.projectionService.buildTeamProjections(input);

      if (query.format === 'csv') {
        const rows = this.sortRows(toProjectionRows(result), query);
        this.sendCsv(res, rows, `week${input.week}_${input.team}_vs_${input.opponent}_projections.csv`);
        return;
      }

      res.status(200).json(teamProjectionToResponse(result));
    } catch (error) {
      next(error);
    }
  };

  getGameProjections = async (req: Request, res: Response, next: NextFunction) => {
    try {
      const input: GameProjectionInput = gameProjectionSchema.parse(req.body);
      const query: ProjectionExportQuery = projectionExportQuerySchema.parse(req.query);

      const result = await this.projectionService.buildGameProjections(input);

      if (query.format === 'csv') {
        const rows: ProjectionRow[] = [];
        for (const side of [result.away, result.home]) {
          if (side.status === 'ok') rows.push(...toProjectionRows(side.result));
        }

        // Failed sides have no rows, so report them out of band
        const failures = this.failedSides(result);
        if (failures.length > 0) res.setHeader(PROJECTION_ERRORS_HEADER, failures.join(','));

        this.sendCsv(res, this.sortRows(rows, query), this.gameCsvFileName(input));
        return;
      }

      res.status(200).json(gameProjectionToResponse(result));
    } catch (error) {
      next(error);
    }
  };

  private sortRows(rows: ProjectionRow[], query: ProjectionExportQuery): ProjectionRow[] {
    return query.sort ? sortProjectionRows(rows, query.sort, query.direction) : rows;
  }

  private failedSides(result: GameProjectionResult): string[] {
    const failures: string[] = [];
    for (const side of [result.away, result.home]) {
      if (side.status === 'error') failures.push(`${side.team}:${side.error.code}`);
    }
    return failures;
  }

  private gameCsvFileName(input: GameProjectionInput): string {
    const seasonWeek = input.season ? `${input.season}-${input.week}` : `week${input.week}`;
    return projectionCsvFileName(seasonWeek, input.away.team, input.home.team);
  }

  private sendCsv(res: Response, rows: ProjectionRow[], fileName: string): void {
    res.setHeader('Content-Type', 'text/csv; charset=utf-8');
    res.setHeader('Content-Disposition', `attachment; filename="${fileName}"`);
    res.status(200).send(projectionRowsToCsv(rows));
  }
}
