import { Router } from 'express';
import { CatalogController } from '../controllers/catalog.controller';
import { AvailabilityController } from '../controllers/availability.controller';
import { MetadataController } from '../controllers/metadata.controller';
import { SystemController } from '../controllers/system.controller';
import { createCatalogRouter } from './catalog.routes';
import { createSystemRouter } from './system.routes';

export interface ServiceControllers {
  catalog: CatalogController;
  availability: AvailabilityController;
  metadata: MetadataController;
  system: SystemController;
}

export function createApiRouter(controllers: ServiceControllers): Router {
  const router = Router();

  router.use(
    '/catalog',
    createCatalogRouter(controllers.catalog, controllers.availability, controllers.metadata)
  );
  router.use('/', createSystemRouter(controllers.system));

  return router;
}
