import cors from 'cors';
import express from 'express';
import morgan from 'morgan';
import { APP_CONFIG } from './config';
import { DatabaseModule } from './db';
import { errorHandler, notFoundHandler } from './middleware/errors';
import { createCoreRouter } from './routes/core';
import demoRouter from './routes/demo';

export type AppOptions = {
  database: DatabaseModule | undefined;
  env?: NodeJS.ProcessEnv;
  apiVersion?: string;
  diagnosticTimeoutMs?: number;
  logFormat?: string;
};

export const createApp = (options: AppOptions) => {
  const logFormat = options.logFormat ?? APP_CONFIG.logFormat;

  const app = express();
  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json());
  if (logFormat !== 'off') {
    app.use(morgan(logFormat));
  }

  app.use(
    createCoreRouter(options.apiVersion ?? APP_CONFIG.apiVersion, {
      database: options.database,
      env: options.env ?? process.env,
      timeoutMs: options.diagnosticTimeoutMs ?? APP_CONFIG.diagnosticTimeoutMs,
    }),
  );
  app.use('/api/demo', demoRouter);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
