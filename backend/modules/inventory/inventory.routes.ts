import { Router } from 'express';
import {
  getAsset,
  getAssets,
  getInventory,
  getIssues,
  getTelemetry,
  getViewByName,
  getViews,
} from './inventory.controller';

export const createInventoryRouter = () => {
  const router = Router();

  router.get('/inventory', getInventory);
  router.get('/assets', getAssets);
  router.get('/assets/:id', getAsset);
  router.get('/issues', getIssues);
  router.get('/views', getViews);
  router.get('/views/:name', getViewByName);
  router.get('/telemetry', getTelemetry);

  return router;
};
