import { Router } from 'express';
import { CatalogController } from '../controllers/catalog.controller';
import { AvailabilityController } from '../controllers/availability.controller';
import { MetadataController } from '../controllers/metadata.controller';

export function createCatalogRouter(
  catalog: CatalogController,
  availability: AvailabilityController,
  metadata: MetadataController
): Router {
  const router = Router();

  // Collection-wide endpoints (registered before /:id)
  router.get('/', catalog.list);
  router.post('/', catalog.create);
  router.get('/duplicates', catalog.listDuplicateSets);
  router.get('/locations/next', catalog.nextLocations);
  router.get('/locations/check', catalog.checkLocation);
  router.get('/autocomplete/box-sets', catalog.autocompleteBoxSets);
  router.get('/autocomplete/storage', catalog.autocompleteStorage);
  router.get('/box-sets', catalog.listBoxSets);
  router.get('/export.csv', catalog.exportCsv);
  router.post('/bulk-import', catalog.bulkImport);

  // TMDB
  router.get('/tmdb/search', metadata.search);
  router.post('/tmdb', catalog.createFromTmdb);
  router.post('/tmdb/refresh-all', metadata.startRefreshAll);
  router.get('/tmdb/refresh-all/:taskId', metadata.getRefreshProgress);
  router.get('/tmdb/:tmdbId', metadata.getMovie);

  // Single item
  router.get('/:id', catalog.getItem);
  router.put('/:id', catalog.update);
  router.patch('/:id/field', catalog.updateField);
  router.delete('/:id', catalog.remove);
  router.get('/:id/duplicates', catalog.getDuplicates);
  router.post('/:id/duplicates/resequence', catalog.resequenceDuplicates);
  router.get('/:id/availability', availability.getAvailability);
  router.post('/:id/availability/refresh', availability.refresh);
  router.post('/:id/imdb', metadata.fetchImdbId);
  router.post('/:id/rematch', metadata.rematch);
  router.get('/:id/posters', metadata.getPosters);
  router.put('/:id/poster', metadata.changePoster);

  return router;
}
