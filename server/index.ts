// MUST be first import to load environment variables before other modules
import { loadedEnvFiles, serverPort } from './env';

import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import multer from 'multer';
import { createLogger } from '../services/logger';
import { registerBuiltinEngines } from '../services/synthesis/engines/index';
import { cleanupAllEngines } from '../services/synthesis/ttsEngine';
import { toError } from '../services/errors';

// Import modular routes
import configRoutes from './routes/config';
import dubbingRoutes from './routes/dubbing';
import healthRoutes from './routes/health';
import optimizationRoutes from './routes/optimization';
import taskRoutes from './routes/tasks';
import { configStore } from './services/configStore';
import { ensureWorkDirs, RESULT_DIR, TEMP_DIR } from './utils/index';

const serverLog = createLogger('Server');

// --- Configuration & Constants ---
const PORT = serverPort();

// --- App Initialization ---
const app = express();

ensureWorkDirs();
registerBuiltinEngines();

// --- Middleware ---
app.use(cors());
app.use(express.json({ limit: '10mb' }));
app.use(express.urlencoded({ extended: true }));

// --- Modular Routes ---
app.use('/api/health', healthRoutes);
app.use('/api/dubbing', dubbingRoutes);
app.use('/api/subtitle-optimization', optimizationRoutes);
app.use('/api/tasks', taskRoutes);
app.use('/api/config', configRoutes);
app.use('/results', express.static(RESULT_DIR));

// --- Error handling ---
app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
  if (err instanceof multer.MulterError) {
    res.status(400).json({ error: `Upload rejected: ${err.message}` });
    return;
  }
  const error = toError(err);
  serverLog.error('Unhandled request error', error.message);
  res.status(500).json({ error: error.message });
});

async function start(): Promise<void> {
  await configStore.initialize();

  const server = app.listen(PORT, () => {
    serverLog.info(`Dubbing server running on http://localhost:${PORT}`);
    serverLog.info(`Temp directory: ${TEMP_DIR}`);
    serverLog.info(`Results directory: ${RESULT_DIR}`);
    if (loadedEnvFiles.length > 0) {
      serverLog.info(`Environment files: ${loadedEnvFiles.join(', ')}`);
    }
  });

  const shutdown = (signal: string) => {
    serverLog.info(`${signal} received, shutting down`);
    server.close();
    void cleanupAllEngines()
      .catch((error) => serverLog.error('Engine cleanup failed', toError(error).message))
      .finally(() => process.exit(0));
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

start().catch((error) => {
  serverLog.error('Failed to start server', toError(error).message);
  process.exit(1);
});
