import { Injectable, Logger } from '@nestjs/common';
import {
  IAtomicCounterStore,
  StoreValue,
  TouchResult,
} from '../interfaces/counter-store.interface';
import { Clock, MemoryStoreOptions } from '../interfaces/config.interface';
import { StoreUninitializedError } from '../errors/store.errors';

const SWEEP_INTERVAL_MS = 60_000;

interface MemoryEntry {
  value: string | number;
  /** Epoch ms, null for no expiry */
  expiresAt: number | null;
}

/**
 * In-memory counter store.
 * Suitable for development and testing; state is local to the process.
 */
@Injectable()
export class MemoryCounterStoreAdapter implements IAtomicCounterStore {
  private readonly logger = new Logger(MemoryCounterStoreAdapter.name);
  private readonly entries: Map<string, MemoryEntry> = new Map();
  private readonly clock: Clock;
  private readonly incrementCreatesMissingKeys: boolean;
  private readonly supportsTouch: boolean;
  private initialized = false;
  private lastSweepAt = 0;

  constructor(options: MemoryStoreOptions & { clock?: Clock } = {}) {
    this.clock = options.clock ?? Date.now;
    this.incrementCreatesMissingKeys =
      options.incrementCreatesMissingKeys ?? true;
    this.supportsTouch = options.supportsTouch ?? true;
  }

  async initialize(): Promise<void> {
    this.initialized = true;
    this.logger.log(
      `Initialized MemoryCounterStoreAdapter (createOnIncrement=${this.incrementCreatesMissingKeys}, touch=${this.supportsTouch})`,
    );
  }

  async close(): Promise<void> {
    this.initialized = false;
    this.entries.clear();
    this.lastSweepAt = 0;
  }

  isInitialized(): boolean {
    return this.initialized;
  }

  async increment(key: string): Promise<number | null> {
    this.assertInitialized();
    const entry = this.liveEntry(key);

    if (!entry) {
      if (!this.incrementCreatesMissingKeys) {
        return null;
      }
      // Like Redis INCR: created at 1 without an expiry
      this.sweepExpired();
      this.entries.set(key, { value: 1, expiresAt: null });
      return 1;
    }

    const current = Number(entry.value);
    if (!Number.isInteger(current)) {
      throw new Error(`Value at ${key} is not an integer`);
    }

    const next = current + 1;
    entry.value = next;
    return next;
  }

  async addIfAbsent(
    key: string,
    initialValue: number,
    ttlSeconds: number,
  ): Promise<boolean> {
    this.assertInitialized();
    if (this.liveEntry(key)) {
      return false;
    }

    this.sweepExpired();
    this.entries.set(key, {
      value: initialValue,
      expiresAt: this.expiryFor(ttlSeconds),
    });
    return true;
  }

  async touch(key: string, ttlSeconds: number): Promise<TouchResult> {
    this.assertInitialized();
    if (!this.supportsTouch) {
      return TouchResult.UNSUPPORTED;
    }

    const entry = this.liveEntry(key);
    if (!entry) {
      return TouchResult.NOT_FOUND;
    }

    entry.expiresAt = this.expiryFor(ttlSeconds);
    return TouchResult.TOUCHED;
  }

  async set(
    key: string,
    value: string | number,
    ttlSeconds: number,
  ): Promise<void> {
    this.assertInitialized();
    this.sweepExpired();
    this.entries.set(key, { value, expiresAt: this.expiryFor(ttlSeconds) });
  }

  async get(key: string): Promise<StoreValue | null> {
    this.assertInitialized();
    return this.liveEntry(key)?.value ?? null;
  }

  async getMulti(keys: string[]): Promise<Map<string, StoreValue>> {
    this.assertInitialized();
    const found = new Map<string, StoreValue>();

    for (const key of keys) {
      const entry = this.liveEntry(key);
      if (entry) {
        found.set(key, entry.value);
      }
    }

    return found;
  }

  /**
   * Remaining TTL in seconds, null for keys without expiry or absent keys
   */
  ttlOf(key: string): number | null {
    const entry = this.liveEntry(key);
    if (!entry || entry.expiresAt === null) {
      return null;
    }
    return (entry.expiresAt - this.clock()) / 1000;
  }

  /**
   * Number of stored entries, including expired ones not swept yet
   */
  get size(): number {
    return this.entries.size;
  }

  /**
   * Drops expired entries that were never read again, at most once per sweep
   * interval
   */
  private sweepExpired(): void {
    const now = this.clock();
    if (now - this.lastSweepAt < SWEEP_INTERVAL_MS) {
      return;
    }
    this.lastSweepAt = now;

    for (const [key, entry] of this.entries) {
      if (entry.expiresAt !== null && entry.expiresAt <= now) {
        this.entries.delete(key);
      }
    }
  }

  private liveEntry(key: string): MemoryEntry | undefined {
    const entry = this.entries.get(key);
    if (entry && entry.expiresAt !== null && entry.expiresAt <= this.clock()) {
      this.entries.delete(key);
      return undefined;
    }
    return entry;
  }

  private expiryFor(ttlSeconds: number): number | null {
    return ttlSeconds > 0 ? this.clock() + ttlSeconds * 1000 : null;
  }

  private assertInitialized(): void {
    if (!this.initialized) {
      throw new StoreUninitializedError(MemoryCounterStoreAdapter.name);
    }
  }
}
