import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

// Largest delay setTimeout honours; anything above is clamped to 1ms.
const MAX_TIMER_MS = 2 ** 31 - 1;

const portSchema = z.coerce.number().int().min(1).max(65535).catch(8000);
const timeoutSchema = z.coerce.number().int().min(1).max(MAX_TIMER_MS).catch(2000);

export type AppConfig = {
  port: number;
  host: string;
  apiVersion: string;
  databaseUri?: string;
  diagnosticTimeoutMs: number;
  logFormat: string;
};

export const loadConfig = (env: NodeJS.ProcessEnv): AppConfig => ({
  port: portSchema.parse(env.PORT),
  host: env.HOST || '0.0.0.0',
  apiVersion: env.API_VERSION || '1.0',
  databaseUri: env.MONGODB_URI || undefined,
  diagnosticTimeoutMs: timeoutSchema.parse(env.DIAGNOSTIC_TIMEOUT_MS),
  logFormat: env.LOG_FORMAT || 'dev',
});

export const APP_CONFIG = loadConfig(process.env);

export const ensureEnvReady = () => {
  if (!process.env.PORT) {
    console.warn(`[config] Using default PORT ${APP_CONFIG.port}`);
  }
  if (!APP_CONFIG.databaseUri) {
    console.warn('[config] MONGODB_URI not set; /test will report the database module as missing');
  }
};
