import mongoose from 'mongoose';
import { createDatabaseModule, loadDatabaseModule } from '../src/db';
import { runDiagnostics } from '../src/services/diagnostics';

jest.spyOn(console, 'log').mockImplementation(() => {});
jest.spyOn(console, 'warn').mockImplementation(() => {});

describe('loadDatabaseModule', () => {
  test('treats an unset URI as a missing module', () => {
    expect(loadDatabaseModule(undefined)).toBeUndefined();
    expect(loadDatabaseModule('')).toBeUndefined();
  });

  test('leaves the handle uninitialized when the URI cannot be used', () => {
    expect(loadDatabaseModule('/var/lib/demo')).toEqual({ db: null });
    expect(loadDatabaseModule('postgres://localhost/demo')).toEqual({ db: null });
  });
});

describe('createDatabaseModule', () => {
  // createConnection() without a URI never opens a socket.
  const connection = mongoose.createConnection();

  test('refuses to list collections before the connection opens', async () => {
    const database = createDatabaseModule(connection);
    expect(database.db?.name).toBeUndefined();
    await expect(database.db?.listCollectionNames()).rejects.toThrow('Database connection is not open');
  });

  test('feeds the failure into the diagnostic report', async () => {
    const report = await runDiagnostics({ database: createDatabaseModule(connection), env: {}, timeoutMs: 1000 });
    expect(report.database).toBe('⚠️  Connected but Error: Database connection is not open');
    expect(report.connection_status).toBe('Connected');
    expect(report.collections).toEqual([]);
  });
});
