/**
 * MONGODB CONNECTION
 * Client wrapper and the document store interface the pipeline depends on
 */

import { MongoClient, Db, Document, Filter, UpdateFilter } from 'mongodb';
import type { AppConfig } from './env';
import type { Logger } from '../utils/logger';

/**
 * The operations the pipeline needs from the document store. Services depend
 * on this interface; MongoStore is the production implementation.
 */
export interface DocumentStore {
  find(collection: string, filter: Filter<Document>): Promise<Document[]>;
  insertOne(collection: string, doc: Document): Promise<void>;
  /** Resolves to the number of modified documents */
  updateOne(collection: string, filter: Filter<Document>, update: UpdateFilter<Document>): Promise<number>;
  /** Resolves to the updated document, or null when nothing matched */
  findOneAndUpdate(collection: string, filter: Filter<Document>, update: UpdateFilter<Document>): Promise<Document | null>;
}

export class MongoStore implements DocumentStore {
  private client: MongoClient | null = null;
  private db: Db | null = null;
  private isInitialized = false;

  constructor(
    private readonly mongoConfig: AppConfig['mongo'],
    private readonly logger: Logger
  ) {}

  /**
   * Connects and checks the server answers a ping
   */
  async initialize(): Promise<void> {
    if (this.isInitialized) {
      this.logger.warn('MongoDB connection already initialized');
      return;
    }

    try {
      const safeUri = this.mongoConfig.uri.replace(/\/\/([^:/@]+):([^@]+)@/, '//$1:***@');
      this.logger.info(`Connecting to MongoDB: ${safeUri} (db: ${this.mongoConfig.dbName})`);

      this.client = new MongoClient(this.mongoConfig.uri, {
        maxPoolSize: this.mongoConfig.maxPoolSize,
        connectTimeoutMS: this.mongoConfig.connectTimeoutMs,
        serverSelectionTimeoutMS: this.mongoConfig.connectTimeoutMs,
      });
      await this.client.connect();
      this.db = this.client.db(this.mongoConfig.dbName);
      await this.db.command({ ping: 1 });

      this.logger.info('MongoDB connection ready');
      this.isInitialized = true;
    } catch (error) {
      this.logger.error('Error connecting to MongoDB:', error);
      throw error;
    }
  }

  private getDb(): Db {
    if (!this.db) {
      throw new Error('MongoDB not initialized. Call initialize() first.');
    }
    return this.db;
  }

  async find(collection: string, filter: Filter<Document>): Promise<Document[]> {
    return this.getDb().collection(collection).find(filter).toArray();
  }

  async insertOne(collection: string, doc: Document): Promise<void> {
    await this.getDb().collection(collection).insertOne(doc);
  }

  async updateOne(collection: string, filter: Filter<Document>, update: UpdateFilter<Document>): Promise<number> {
    const result = await this.getDb().collection(collection).updateOne(filter, update);
    return result.modifiedCount;
  }

  async findOneAndUpdate(
    collection: string,
    filter: Filter<Document>,
    update: UpdateFilter<Document>
  ): Promise<Document | null> {
    return this.getDb()
      .collection(collection)
      .findOneAndUpdate(filter, update, { returnDocument: 'after', includeResultMetadata: false });
  }

  async close(): Promise<void> {
    if (this.client) {
      try {
        await this.client.close();
        this.client = null;
        this.db = null;
        this.isInitialized = false;
        this.logger.info('MongoDB connection closed');
      } catch (error) {
        this.logger.error('Error closing MongoDB connection:', error);
        throw error;
      }
    }
  }
}

export default MongoStore;
