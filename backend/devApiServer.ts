import 'dotenv/config';
import express, { type NextFunction, type Request, type Response } from 'express';

import { loadInventoryConfig } from './config/InventoryConfig';
import { createInventoryRouter } from './modules/inventory/inventory.routes';
import { setInventorySnapshot } from './modules/inventory/inventory.service';
import { loadInventory } from './pipeline/loadInventory';
import { mapErrorToApiResponse } from './reliability/FailureHandling';
import { renderIssueCounts } from './rendering/ValidationReportRenderer';

const config = loadInventoryConfig();

const app = express();
app.use(express.json({ limit: '1mb' }));

app.use((req, res, next) => {
  const timer = setTimeout(() => {
    if (res.headersSent) return;
    res.status(504).json({ success: false, errorMessage: 'Gateway Timeout' });
  }, config.apiTimeoutMs);

  res.on('finish', () => clearTimeout(timer));
  res.on('close', () => clearTimeout(timer));
  req.setTimeout(config.apiTimeoutMs);
  next();
});

app.get('/health', (_req, res) => {
  res.json({ ok: true });
});

const bootstrap = async () => {
  const snapshot = loadInventory({
    assetFiles: config.assetFiles,
    typesFile: config.typesFile,
    maxTraversalSteps: config.maxTraversalSteps,
  });
  setInventorySnapshot(snapshot, { theme: config.theme, maxFixpointPasses: config.maxFixpointPasses });

  // eslint-disable-next-line no-console
  console.log(`[api] loaded ${snapshot.assets.length} assets from ${config.assetFiles.length} files`);
  // eslint-disable-next-line no-console
  console.log(`[api] ${renderIssueCounts(snapshot.issues)}`);

  app.use('/api', createInventoryRouter());

  // Fallback 404 for any unhandled /api route.
  app.use('/api', (_req, res) => {
    res.status(404).json({ success: false, errorMessage: 'Not Found' });
  });

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const { status, body } = mapErrorToApiResponse(err, { operation: `${req.method} ${req.path}` });
    res.status(status).json(body);
  });

  await new Promise<void>((resolve) => {
    app.listen(config.apiPort, () => {
      // eslint-disable-next-line no-console
      console.log(`[api] listening on http://localhost:${config.apiPort}`);
      resolve();
    });
  });
};

bootstrap().catch((err) => {
  // eslint-disable-next-line no-console
  console.error('[api] failed to start', err);
  process.exitCode = 1;
});
