import mongoose, { Connection } from 'mongoose';

export interface DatabaseHandle {
  name?: string;
  listCollectionNames(): Promise<string[]>;
}

/**
 * Optional database collaborator. The service never owns a database; when one
 * is configured GET /test only lists its collections.
 * An absent module (`undefined`) and a module without a handle are distinct,
 * reportable states.
 */
export interface DatabaseModule {
  db: DatabaseHandle | null;
  close?: () => Promise<void>;
}

const SERVER_SELECTION_TIMEOUT_MS = 5000;
const MONGODB_URI_PATTERN = /^mongodb(\+srv)?:\/\//;

export const createDatabaseModule = (connection: Connection): DatabaseModule => {
  const handle: DatabaseHandle = {
    get name() {
      return connection.name || undefined;
    },
    listCollectionNames: async () => {
      const db = connection.db;
      if (connection.readyState !== mongoose.ConnectionStates.connected || !db) {
        throw new Error('Database connection is not open');
      }
      const collections = await db.listCollections({}, { nameOnly: true }).toArray();
      return collections.map((collection) => collection.name);
    },
  };
  return { db: handle, close: () => connection.close() };
};

export const loadDatabaseModule = (databaseUri?: string): DatabaseModule | undefined => {
  if (!databaseUri) return undefined;

  if (!MONGODB_URI_PATTERN.test(databaseUri)) {
    console.warn('[db] MONGODB_URI is not a mongodb:// URI, leaving the handle uninitialized');
    return { db: null };
  }

  const connection = mongoose.createConnection();
  const database = createDatabaseModule(connection);
  connection.on('error', (err) => console.warn('[db] Connection error', err));
  connection.openUri(databaseUri, { serverSelectionTimeoutMS: SERVER_SELECTION_TIMEOUT_MS }).then(
    () => console.log(`[db] Connected to ${database.db?.name ?? 'database'}`),
    (err: unknown) => console.warn('[db] Failed to connect', err),
  );
  return database;
};
