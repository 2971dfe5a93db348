import { Request, Response, NextFunction } from 'express';
import { CatalogService } from '../services/catalog.service';
import { MetadataService } from '../services/metadata.service';
import { MetadataSyncService } from '../services/metadata-sync.service';
import { toHttpError, ValidationError } from '../middleware/errorHandler';
import { getIdParam, getStringParam, parseInput } from '../utils/params';
import { posterSchema, rematchSchema, searchQuerySchema } from '../validation/catalog.schemas';

export class MetadataController {
  constructor(
    private catalogService: CatalogService,
    private metadataService: MetadataService,
    private metadataSyncService: MetadataSyncService
  ) {}

  search = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { q } = parseInput(searchQuerySchema, req.query);
      res.json({ results: await this.metadataService.searchResults(q) });
    } catch (error) {
      next(toHttpError(error, 'Failed to search TMDB', 'tmdb'));
    }
  };

  getMovie = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const tmdbId = getIdParam(req.params.tmdbId, 'tmdbId');
      const details = await this.metadataService.getMovieDetails(tmdbId);
      res.json({
        ...this.metadataService.formatMovieData(details),
        posterUrl: this.metadataService.posterUrl(details.poster_path),
      });
    } catch (error) {
      next(toHttpError(error, 'Failed to fetch movie details', 'tmdb'));
    }
  };

  fetchImdbId = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const item = this.catalogService.get(getIdParam(req.params.id));
      const result = await this.metadataSyncService.fetchImdbId(item);
      if (!result.success) {
        res.status(422).json(result);
        return;
      }
      res.json({ success: true, imdbId: result.imdbId });
    } catch (error) {
      next(toHttpError(error, 'Failed to fetch IMDb ID', 'tmdb'));
    }
  };

  rematch = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const item = this.catalogService.get(getIdParam(req.params.id));
      const { tmdbId } = parseInput(rematchSchema, req.body);
      const updated = await this.metadataSyncService.rematch(item, tmdbId);
      res.json(this.catalogService.toView(updated));
    } catch (error) {
      next(toHttpError(error, 'Failed to rematch movie', 'tmdb'));
    }
  };

  getPosters = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const item = this.catalogService.get(getIdParam(req.params.id));
      if (!item.tmdbId) {
        throw new ValidationError('This item has no TMDB ID.', 400, 'tmdbId');
      }
      const posters = await this.metadataService.getPosterOptions(item.tmdbId);
      res.json({
        posters,
        currentPoster: item.posterPath,
      });
    } catch (error) {
      next(toHttpError(error, 'Failed to fetch posters', 'tmdb'));
    }
  };

  changePoster = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const item = this.catalogService.get(getIdParam(req.params.id));
      const { posterPath } = parseInput(posterSchema, req.body);
      const updated = this.metadataSyncService.changePoster(item, posterPath);
      res.json(this.catalogService.toView(updated));
    } catch (error) {
      next(toHttpError(error, 'Failed to change poster', 'tmdb'));
    }
  };

  startRefreshAll = async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const taskId = this.metadataSyncService.startRefreshAll();
      res.status(202).json({ taskId });
    } catch (error) {
      next(toHttpError(error, 'Failed to start metadata refresh', 'tmdb'));
    }
  };

  getRefreshProgress = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json(this.metadataSyncService.getRefreshProgress(getStringParam(req.params.taskId)));
    } catch (error) {
      next(toHttpError(error, 'Failed to read refresh progress', 'tmdb'));
    }
  };
}
