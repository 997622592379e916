import { DatabaseHandle, DatabaseModule } from '../../src/db';
import { runDiagnostics } from '../../src/services/diagnostics';

const handleListing = (names: string[]): DatabaseHandle => ({
  name: 'fake',
  listCollectionNames: async () => names,
});

describe('runDiagnostics', () => {
  test('reports a missing database module', async () => {
    const report = await runDiagnostics({ database: undefined, env: {}, timeoutMs: 50 });
    expect(report).toEqual({
      backend: '✅ Running',
      database: '❌ Database module not found',
      database_url: '❌ Not Set',
      database_name: '❌ Not Set',
      connection_status: 'Not Connected',
      collections: [],
    });
  });

  test('reports environment variables independently of the module', async () => {
    const report = await runDiagnostics({
      database: undefined,
      env: { DATABASE_URL: 'mongodb://placeholder', DATABASE_NAME: '' },
      timeoutMs: 50,
    });
    expect(report.database).toBe('❌ Database module not found');
    expect(report.database_url).toBe('✅ Set');
    expect(report.database_name).toBe('❌ Not Set');
  });

  test('reports a module without an initialized handle', async () => {
    const report = await runDiagnostics({ database: { db: null }, env: { DATABASE_NAME: 'demo' }, timeoutMs: 50 });
    expect(report).toEqual({
      backend: '✅ Running',
      database: '⚠️  Available but not initialized',
      database_url: '❌ Not Set',
      database_name: '✅ Set',
      connection_status: 'Not Connected',
      collections: [],
    });
  });

  test('lists at most ten collections from a working handle', async () => {
    const names = Array.from({ length: 12 }, (_, index) => `collection_${index + 1}`);
    const report = await runDiagnostics({ database: { db: handleListing(names) }, env: {}, timeoutMs: 50 });
    expect(report.database).toBe('✅ Connected & Working');
    expect(report.connection_status).toBe('Connected');
    expect(report.collections).toEqual(names.slice(0, 10));
  });

  test('truncates enumeration errors to 50 characters', async () => {
    const handle: DatabaseHandle = {
      listCollectionNames: async () => {
        throw new Error('x'.repeat(80));
      },
    };
    const report = await runDiagnostics({ database: { db: handle }, env: {}, timeoutMs: 50 });
    expect(report.database).toBe(`⚠️  Connected but Error: ${'x'.repeat(50)}`);
    expect(report.connection_status).toBe('Connected');
    expect(report.collections).toEqual([]);
  });

  test('catches handles that throw synchronously', async () => {
    const handle: DatabaseHandle = {
      listCollectionNames: () => {
        throw new Error('socket closed');
      },
    };
    const report = await runDiagnostics({ database: { db: handle }, env: {}, timeoutMs: 50 });
    expect(report.database).toBe('⚠️  Connected but Error: socket closed');
  });

  test('gives up on handles that never answer', async () => {
    const handle: DatabaseHandle = {
      listCollectionNames: () => new Promise<string[]>(() => undefined),
    };
    const report = await runDiagnostics({ database: { db: handle }, env: {}, timeoutMs: 10 });
    expect(report.database).toBe('⚠️  Connected but Error: Timed out listing collections after 10ms');
  });

  test('reports modules that fail while being inspected', async () => {
    const database: DatabaseModule = {
      get db(): DatabaseHandle | null {
        throw new Error('module failed to load');
      },
    };
    const report = await runDiagnostics({ database, env: { DATABASE_URL: 'mongodb://placeholder' }, timeoutMs: 50 });
    expect(report.database).toBe('❌ Error: module failed to load');
    expect(report.database_url).toBe('✅ Set');
    expect(report.connection_status).toBe('Not Connected');
  });
});
