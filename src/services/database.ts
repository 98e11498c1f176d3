import { MongoClient } from 'mongodb';
import type { AppConfig } from '@/config/app.config';
import { logger } from '@/services/logger';
import { MongoCatalogStore } from '@/services/catalog/mongo-catalog-store';
import type { CatalogStore } from '@/services/catalog/catalog-store';

const PLACEHOLDER_URI = 'mongodb+srv://<username>:<password>@cluster.mongodb.net/';

export interface DatabaseConnection {
  client: MongoClient;
  store: CatalogStore;
}

type DatabaseConfig = Pick<
  AppConfig,
  'mongodbUri' | 'databaseName' | 'productsCollection' | 'ordersCollection'
>;

/** Rejects a missing URI or the one still holding the `.env.example` placeholder. */
export function resolveMongoUri(uri: string | undefined): string {
  if (!uri) {
    throw new Error(
      'MONGODB_URI environment variable is not set. Please create a .env file with your MongoDB connection string.',
    );
  }
  if (uri === PLACEHOLDER_URI) {
    throw new Error('Please update MONGODB_URI in your .env file with your actual MongoDB connection string.');
  }
  return uri;
}

/**
 * Opens the MongoDB client and checks it with a ping. The caller owns the
 * returned client and closes it on shutdown.
 */
export const connectDatabase = async (config: DatabaseConfig): Promise<DatabaseConnection> => {
  const uri = resolveMongoUri(config.mongodbUri);
  const client = new MongoClient(uri);

  try {
    await client.connect();
    const db = client.db(config.databaseName);
    const store = new MongoCatalogStore(db, {
      productsCollection: config.productsCollection,
      ordersCollection: config.ordersCollection,
    });
    await store.ping();

    logger.info(`Connected to MongoDB database: ${config.databaseName}`);
    return { client, store };
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.error('MongoDB connection failed', { message });
    await client.close().catch((closeErr: unknown) => {
      logger.warn('Failed to close MongoDB client after connection error', {
        message: closeErr instanceof Error ? closeErr.message : String(closeErr),
      });
    });
    throw new Error(`Failed to connect to MongoDB: ${message}`, { cause: err });
  }
};

export const closeDatabase = async (client: MongoClient): Promise<void> => {
  await client.close();
  logger.info('MongoDB connection closed');
};
