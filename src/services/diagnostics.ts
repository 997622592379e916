import { DatabaseModule } from '../db';
import { DiagnosticReport } from '../models/types';
import { errorMessage } from '../utils/errors';

export const MAX_REPORTED_COLLECTIONS = 10;
const MAX_ERROR_LENGTH = 50;

export type DiagnosticOptions = {
  database: DatabaseModule | undefined;
  env: NodeJS.ProcessEnv;
  timeoutMs: number;
};

const shortError = (err: unknown) => errorMessage(err).slice(0, MAX_ERROR_LENGTH);

const withTimeout = <T>(task: () => Promise<T>, timeoutMs: number) =>
  new Promise<T>((resolve, reject) => {
    const timer = setTimeout(
      () => reject(new Error(`Timed out listing collections after ${timeoutMs}ms`)),
      timeoutMs,
    );
    Promise.resolve()
      .then(task)
      .then(
        (value) => {
          clearTimeout(timer);
          resolve(value);
        },
        (err: unknown) => {
          clearTimeout(timer);
          reject(err);
        },
      );
  });

const envFlag = (value: string | undefined) => (value ? '✅ Set' : '❌ Not Set');

/**
 * Describes whether a database integration would be usable. Every failure is
 * reported in the returned object; the promise itself never rejects.
 */
export const runDiagnostics = async ({ database, env, timeoutMs }: DiagnosticOptions): Promise<DiagnosticReport> => {
  const report: DiagnosticReport = {
    backend: '✅ Running',
    database: '❌ Not Available',
    database_url: '❌ Not Set',
    database_name: '❌ Not Set',
    connection_status: 'Not Connected',
    collections: [],
  };

  try {
    const handle = database ? database.db : undefined;
    if (handle === undefined) {
      report.database = '❌ Database module not found';
    } else if (handle === null) {
      report.database = '⚠️  Available but not initialized';
    } else {
      report.database = '✅ Available';
      report.connection_status = 'Connected';
      try {
        const names = await withTimeout(() => handle.listCollectionNames(), timeoutMs);
        report.collections = names.slice(0, MAX_REPORTED_COLLECTIONS);
        report.database = '✅ Connected & Working';
      } catch (err) {
        report.database = `⚠️  Connected but Error: ${shortError(err)}`;
      }
    }
  } catch (err) {
    report.database = `❌ Error: ${shortError(err)}`;
  }

  report.database_url = envFlag(env.DATABASE_URL);
  report.database_name = envFlag(env.DATABASE_NAME);

  return report;
};
