import { Request, Response, NextFunction } from 'express';
import type { HealthStatus } from '@shelfarr/shared-types';
import { StatsService } from '../services/stats.service';
import { SettingsService } from '../services/settings.service';
import { MetadataService } from '../services/metadata.service';
import { toHttpError } from '../middleware/errorHandler';
import { logStore } from '../utils/logger';
import { parseInput } from '../utils/params';
import { logQuerySchema, settingsSchema } from '../validation/catalog.schemas';

export interface SystemControllerDeps {
  statsService: StatsService;
  settingsService: SettingsService;
  metadataService: MetadataService;
  availabilityEnabled: boolean;
  pingDatabase: () => boolean;
}

/** Stats, settings, logs and health. */
export class SystemController {
  constructor(private deps: SystemControllerDeps) {}

  getStats = async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json(this.deps.statsService.getStats());
    } catch (error) {
      next(toHttpError(error, 'Failed to compute statistics', 'shelfarr'));
    }
  };

  getSettings = async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json(this.deps.settingsService.getSettings());
    } catch (error) {
      next(toHttpError(error, 'Failed to read settings', 'shelfarr'));
    }
  };

  updateSettings = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { tmdbApiKey } = parseInput(settingsSchema, req.body);
      res.json(this.deps.settingsService.setTmdbApiKey(tmdbApiKey));
    } catch (error) {
      next(toHttpError(error, 'Failed to save settings', 'shelfarr'));
    }
  };

  getLogs = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const query = parseInput(logQuerySchema, req.query);
      res.json(logStore.query(query));
    } catch (error) {
      next(toHttpError(error, 'Failed to fetch logs', 'shelfarr'));
    }
  };

  getHealth = async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const health: HealthStatus = {
        status: 'ok',
        database: this.deps.pingDatabase(),
        services: {
          tmdb: this.deps.metadataService.isConfigured(),
          yts: this.deps.availabilityEnabled,
        },
      };
      res.json(health);
    } catch (error) {
      next(toHttpError(error, 'Health check failed', 'shelfarr'));
    }
  };
}
