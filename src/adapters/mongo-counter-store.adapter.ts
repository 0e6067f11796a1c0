import { Injectable, Logger } from '@nestjs/common';
import { InjectConnection } from '@nestjs/mongoose';
import { Connection, FilterQuery, Model, mongo } from 'mongoose';
import {
  IAtomicCounterStore,
  StoreValue,
  TouchResult,
} from '../interfaces/counter-store.interface';
import {
  CounterRecordSchema,
  ICounterRecord,
} from '../models/counter-record.model';
import {
  describeError,
  StoreUninitializedError,
  TransientStoreError,
  wrapStoreCall,
} from '../errors/store.errors';
import { Clock } from '../interfaces/config.interface';
import { DEFAULT_OPERATION_TIMEOUT_MS } from '../utils/constants';

const MODEL_NAME = 'VelocityCounterRecord';
const DUPLICATE_KEY_ERROR = 11000;

/**
 * MongoDB counter store.
 *
 * Each key is one document; expiry is delegated to a TTL index on expiresAt.
 * The TTL monitor only runs about once a minute, so reads also filter out
 * documents that are past their expiry but not yet removed.
 */
@Injectable()
export class MongoCounterStoreAdapter implements IAtomicCounterStore {
  private readonly logger = new Logger(MongoCounterStoreAdapter.name);
  private readonly model?: Model<ICounterRecord>;
  private readonly operationTimeoutMs: number;
  private readonly clock: Clock;
  private initialized = false;

  constructor(
    @InjectConnection() private readonly connection?: Connection,
    collectionName = 'velocity_counters',
    options: { operationTimeoutMs?: number; clock?: Clock } = {},
  ) {
    this.operationTimeoutMs =
      options.operationTimeoutMs ?? DEFAULT_OPERATION_TIMEOUT_MS;
    this.clock = options.clock ?? Date.now;

    if (!this.connection) {
      this.logger.warn('Cannot initialize counter model without connection');
      return;
    }

    // Check if the model already exists on this connection
    this.model =
      this.connection.models[MODEL_NAME] ??
      this.connection.model<ICounterRecord>(
        MODEL_NAME,
        CounterRecordSchema,
        collectionName,
      );
  }

  async initialize(): Promise<void> {
    const model = this.model;
    if (!model) {
      const error =
        'MongoCounterStoreAdapter failed to initialize: No model or connection provided';
      this.logger.error(error);
      throw new Error(error);
    }

    await model.collection.createIndex(
      { expiresAt: 1 },
      { expireAfterSeconds: 0 },
    );
    this.initialized = true;
    this.logger.log(
      `Initialized MongoCounterStoreAdapter on collection ${model.collection.name}`,
    );
  }

  async close(): Promise<void> {
    // The connection belongs to MongooseModule, which closes it on shutdown
    this.initialized = false;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  async increment(key: string): Promise<number | null> {
    const model = this.requireModel();
    const record = await wrapStoreCall('findOneAndUpdate', () =>
      model
        .findOneAndUpdate({ _id: key }, { $inc: { value: 1 } }, { new: true })
        .maxTimeMS(this.operationTimeoutMs)
        .lean()
        .exec(),
    );

    if (!record) {
      return null;
    }
    return Number(record.value);
  }

  async addIfAbsent(
    key: string,
    initialValue: number,
    ttlSeconds: number,
  ): Promise<boolean> {
    const model = this.requireModel();
    try {
      await model.create({
        _id: key,
        value: initialValue,
        expiresAt: this.expiryFor(ttlSeconds),
      });
      return true;
    } catch (error) {
      if (
        error instanceof mongo.MongoServerError &&
        error.code === DUPLICATE_KEY_ERROR
      ) {
        return false;
      }
      throw new TransientStoreError(`insert failed: ${describeError(error)}`, {
        cause: error,
      });
    }
  }

  async touch(key: string, ttlSeconds: number): Promise<TouchResult> {
    const model = this.requireModel();
    const result = await wrapStoreCall('updateOne', () =>
      model
        .updateOne(
          { _id: key },
          { $set: { expiresAt: this.expiryFor(ttlSeconds) } },
        )
        .maxTimeMS(this.operationTimeoutMs)
        .exec(),
    );
    return result.matchedCount > 0 ? TouchResult.TOUCHED : TouchResult.NOT_FOUND;
  }

  async set(
    key: string,
    value: string | number,
    ttlSeconds: number,
  ): Promise<void> {
    const model = this.requireModel();
    await wrapStoreCall('updateOne', () =>
      model
        .updateOne(
          { _id: key },
          { $set: { value, expiresAt: this.expiryFor(ttlSeconds) } },
          { upsert: true },
        )
        .maxTimeMS(this.operationTimeoutMs)
        .exec(),
    );
  }

  async get(key: string): Promise<StoreValue | null> {
    const model = this.requireModel();
    const record = await wrapStoreCall('findOne', () =>
      model
        .findOne({ _id: key, ...this.notExpired() })
        .maxTimeMS(this.operationTimeoutMs)
        .lean()
        .exec(),
    );
    return record ? record.value : null;
  }

  async getMulti(keys: string[]): Promise<Map<string, StoreValue>> {
    const model = this.requireModel();
    const found = new Map<string, StoreValue>();

    if (keys.length === 0) {
      return found;
    }

    const records = await wrapStoreCall('find', () =>
      model
        .find({ _id: { $in: keys }, ...this.notExpired() })
        .maxTimeMS(this.operationTimeoutMs)
        .lean()
        .exec(),
    );
    for (const record of records) {
      found.set(record._id, record.value);
    }
    return found;
  }

  private notExpired(): FilterQuery<ICounterRecord> {
    return {
      $or: [
        { expiresAt: null },
        { expiresAt: { $gt: new Date(this.clock()) } },
      ],
    };
  }

  private expiryFor(ttlSeconds: number): Date | null {
    return ttlSeconds > 0 ? new Date(this.clock() + ttlSeconds * 1000) : null;
  }

  private requireModel(): Model<ICounterRecord> {
    if (!this.initialized || !this.model) {
      throw new StoreUninitializedError(MongoCounterStoreAdapter.name);
    }
    return this.model;
  }
}
