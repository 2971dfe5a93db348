import { Request, Response, NextFunction } from 'express';
import { CatalogService } from '../services/catalog.service';
import { DuplicateService } from '../services/duplicate.service';
import { LocationService } from '../services/location.service';
import { ExportService } from '../services/export.service';
import { BulkImportService } from '../services/bulk-import.service';
import { toHttpError } from '../middleware/errorHandler';
import { getIdParam, getQueryString, parseInput } from '../utils/params';
import {
  bulkImportSchema,
  catalogFilterSchema,
  createCatalogItemSchema,
  createFromTmdbSchema,
  fieldUpdateSchema,
  locationCheckSchema,
  locationCountSchema,
  rematchSchema,
  updateCatalogItemSchema,
} from '../validation/catalog.schemas';

export class CatalogController {
  constructor(
    private catalogService: CatalogService,
    private duplicateService: DuplicateService,
    private locationService: LocationService,
    private exportService: ExportService,
    private bulkImportService: BulkImportService
  ) {}

  list = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const filters = parseInput(catalogFilterSchema, req.query);
      res.json(this.catalogService.list(filters));
    } catch (error) {
      next(toHttpError(error, 'Failed to fetch catalog', 'catalog'));
    }
  };

  getItem = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const item = this.catalogService.get(getIdParam(req.params.id));
      res.json(this.catalogService.toView(item));
    } catch (error) {
      next(toHttpError(error, 'Failed to fetch item', 'catalog'));
    }
  };

  create = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const input = parseInput(createCatalogItemSchema, req.body);
      const item = this.catalogService.create(input);
      res.status(201).json(this.catalogService.toView(item));
    } catch (error) {
      next(toHttpError(error, 'Failed to add item', 'catalog'));
    }
  };

  createFromTmdb = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { tmdbId } = parseInput(rematchSchema, req.body);
      const input = parseInput(createFromTmdbSchema, req.body);
      const item = await this.catalogService.createFromTmdb(tmdbId, input);
      res.status(201).json(this.catalogService.toView(item));
    } catch (error) {
      next(toHttpError(error, 'Failed to add movie from TMDB', 'catalog'));
    }
  };

  update = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const id = getIdParam(req.params.id);
      const patch = parseInput(updateCatalogItemSchema, req.body);
      const item = this.catalogService.update(id, patch);
      res.json(this.catalogService.toView(item));
    } catch (error) {
      next(toHttpError(error, 'Failed to update item', 'catalog'));
    }
  };

  updateField = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const id = getIdParam(req.params.id);
      const { field, value } = parseInput(fieldUpdateSchema, req.body);
      const item = this.catalogService.updateField(id, field, value);
      res.json({ success: true, item: this.catalogService.toView(item) });
    } catch (error) {
      next(toHttpError(error, 'Failed to update field', 'catalog'));
    }
  };

  remove = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      this.catalogService.delete(getIdParam(req.params.id));
      res.status(204).send();
    } catch (error) {
      next(toHttpError(error, 'Failed to delete item', 'catalog'));
    }
  };

  getDuplicates = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const item = this.catalogService.get(getIdParam(req.params.id));
      const members = this.duplicateService.resolveDuplicateSet(item);
      res.json({
        hasDuplicates: this.duplicateService.hasDuplicates(item),
        nextCopyNumber: this.duplicateService.nextCopyNumber(item),
        copyLabel: this.duplicateService.formatCopyLabel(item),
        items: members.map((member) => this.catalogService.toView(member)),
      });
    } catch (error) {
      next(toHttpError(error, 'Failed to resolve duplicates', 'catalog'));
    }
  };

  resequenceDuplicates = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const item = this.catalogService.get(getIdParam(req.params.id));
      const members = this.duplicateService.resequenceDuplicateSet(item);
      res.json({ items: members.map((member) => this.catalogService.toView(member)) });
    } catch (error) {
      next(toHttpError(error, 'Failed to resequence copies', 'catalog'));
    }
  };

  listDuplicateSets = async (_req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json(this.duplicateService.listDuplicateSets());
    } catch (error) {
      next(toHttpError(error, 'Failed to list duplicate sets', 'catalog'));
    }
  };

  nextLocations = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { count } = parseInput(locationCountSchema, req.query);
      res.json({
        nextLocationNumber: this.locationService.nextLocationNumber(),
        locations: this.locationService.nextSequentialLocations(count),
      });
    } catch (error) {
      next(toHttpError(error, 'Failed to compute locations', 'catalog'));
    }
  };

  checkLocation = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { value, excludeId } = parseInput(locationCheckSchema, req.query);
      res.json(this.locationService.checkUnboxedLocation(value, excludeId));
    } catch (error) {
      next(toHttpError(error, 'Failed to check location', 'catalog'));
    }
  };

  autocompleteBoxSets = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json(this.catalogService.autocompleteBoxSets(getQueryString(req.query.q) ?? ''));
    } catch (error) {
      next(toHttpError(error, 'Failed to autocomplete box sets', 'catalog'));
    }
  };

  autocompleteStorage = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json(this.catalogService.autocompleteStorageLocations(getQueryString(req.query.q) ?? ''));
    } catch (error) {
      next(toHttpError(error, 'Failed to autocomplete storage locations', 'catalog'));
    }
  };

  listBoxSets = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      res.json(this.catalogService.listBoxSets(getQueryString(req.query.search)));
    } catch (error) {
      next(toHttpError(error, 'Failed to list box sets', 'catalog'));
    }
  };

  exportCsv = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const { page: _page, pageSize: _pageSize, ...filters } = parseInput(catalogFilterSchema, req.query);
      const csv = this.exportService.exportCsv(filters);
      res.setHeader('Content-Type', 'text/csv; charset=utf-8');
      res.setHeader(
        'Content-Disposition',
        `attachment; filename="${this.exportService.filename()}"`
      );
      res.send(csv);
    } catch (error) {
      next(toHttpError(error, 'Failed to export catalog', 'catalog'));
    }
  };

  bulkImport = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const input = parseInput(bulkImportSchema, req.body);
      res.json(await this.bulkImportService.importMovies(input));
    } catch (error) {
      next(toHttpError(error, 'Bulk import failed', 'catalog'));
    }
  };
}
