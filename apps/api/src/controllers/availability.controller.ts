import { Request, Response, NextFunction } from 'express';
import { CatalogService } from '../services/catalog.service';
import {
  AvailabilityFailureReason,
  AvailabilityService,
} from '../services/availability.service';
import { toHttpError } from '../middleware/errorHandler';
import { getIdParam } from '../utils/params';

const FAILURE_STATUS: Record<AvailabilityFailureReason, number> = {
  missing_identifier: 422,
  provider_error: 502,
  not_found: 404,
};

export class AvailabilityController {
  constructor(
    private catalogService: CatalogService,
    private availabilityService: AvailabilityService
  ) {}

  getAvailability = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const item = this.catalogService.get(getIdParam(req.params.id));
      res.json(this.availabilityService.summarize(item));
    } catch (error) {
      next(toHttpError(error, 'Failed to read availability', 'yts'));
    }
  };

  refresh = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const item = this.catalogService.get(getIdParam(req.params.id));
      const force = req.query.force === 'true' || req.body?.force === true;
      const result = await this.availabilityService.refreshAvailability(item, { force });

      if (!result.success) {
        res.status(FAILURE_STATUS[result.reason]).json(result);
        return;
      }
      res.json({ success: true, availability: this.availabilityService.summarize(result.item) });
    } catch (error) {
      next(toHttpError(error, 'Failed to refresh availability', 'yts'));
    }
  };
}
