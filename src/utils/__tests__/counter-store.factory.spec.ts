import {
  createCounterStore,
  initializeCounterStore,
} from '../counter-store.factory';
import { MemoryCounterStoreAdapter } from '../../adapters/memory-counter-store.adapter';
import { MongoCounterStoreAdapter } from '../../adapters/mongo-counter-store.adapter';
import { RedisCounterStoreAdapter } from '../../adapters/redis-counter-store.adapter';
import { TouchResult } from '../../interfaces/counter-store.interface';

describe('counter store factory', () => {
  describe('createCounterStore', () => {
    it('should pass memory options through', async () => {
      const store = createCounterStore({
        store: 'memory',
        storeOptions: { memory: { supportsTouch: false } },
      });
      await store.initialize();

      expect(store).toBeInstanceOf(MemoryCounterStoreAdapter);
      expect(await store.touch('k', 10)).toBe(TouchResult.UNSUPPORTED);
    });

    it('should build an unconnected redis store', async () => {
      const store = createCounterStore({
        store: 'redis',
        servers: ['127.0.0.1:6379'],
      });

      expect(store).toBeInstanceOf(RedisCounterStoreAdapter);
      expect(store.isInitialized()).toBe(false);
      await store.close();
    });

    it('should build a mongo store on the given connection', () => {
      const store = createCounterStore({
        store: 'mongo',
        storeOptions: { mongoUri: 'mongodb://localhost:27017/test' },
      });

      expect(store).toBeInstanceOf(MongoCounterStoreAdapter);
    });

    it('should return the custom instance as is', () => {
      const custom = new MemoryCounterStoreAdapter();

      expect(
        createCounterStore({ store: 'custom', customStoreInstance: custom }),
      ).toBe(custom);
    });

    it('should require an instance for the custom store', () => {
      expect(() => createCounterStore({ store: 'custom' })).toThrow(
        'Counter store type is "custom" but no customStoreInstance was provided in VelocityCounterConfig.',
      );
    });
  });

  describe('initializeCounterStore', () => {
    it('should initialize the store', async () => {
      const store = await initializeCounterStore(
        new MemoryCounterStoreAdapter(),
      );

      expect(store.isInitialized()).toBe(true);
    });

    it('should hand back an uninitialized store when initialize fails', async () => {
      const unreachable = new MongoCounterStoreAdapter();

      const store = await initializeCounterStore(unreachable);

      expect(store).toBe(unreachable);
      expect(store.isInitialized()).toBe(false);
    });
  });
});
