import { Logger } from '@nestjs/common';
import { Cluster, Redis } from 'ioredis';
import { RedisCounterStoreAdapter } from '../redis-counter-store.adapter';
import { TouchResult } from '../../interfaces/counter-store.interface';
import {
  StoreUninitializedError,
  TransientStoreError,
} from '../../errors/store.errors';

describe('RedisCounterStoreAdapter', () => {
  let adapter: RedisCounterStoreAdapter;
  let redisMock: {
    status: string;
    on: jest.Mock;
    connect: jest.Mock;
    ping: jest.Mock;
    quit: jest.Mock;
    disconnect: jest.Mock;
    incr: jest.Mock;
    set: jest.Mock;
    pexpire: jest.Mock;
    get: jest.Mock;
    mget: jest.Mock;
  };

  beforeEach(async () => {
    redisMock = {
      status: 'ready',
      on: jest.fn(),
      connect: jest.fn().mockResolvedValue(undefined),
      ping: jest.fn().mockResolvedValue('PONG'),
      quit: jest.fn().mockResolvedValue('OK'),
      disconnect: jest.fn(),
      incr: jest.fn(),
      set: jest.fn(),
      pexpire: jest.fn(),
      get: jest.fn(),
      mget: jest.fn(),
    };

    adapter = new RedisCounterStoreAdapter({
      client: redisMock as unknown as Redis,
      keyPrefix: 'test:',
    });
    await adapter.initialize();
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  describe('initialize', () => {
    it('should ping an already connected client', () => {
      expect(redisMock.connect).not.toHaveBeenCalled();
      expect(redisMock.ping).toHaveBeenCalledTimes(1);
      expect(adapter.isInitialized()).toBe(true);
    });

    it('should connect a lazy client first', async () => {
      redisMock.status = 'wait';
      const lazy = new RedisCounterStoreAdapter({
        client: redisMock as unknown as Redis,
      });

      await lazy.initialize();

      expect(redisMock.connect).toHaveBeenCalledTimes(1);
    });

    it('should stay uninitialized when the server does not answer', async () => {
      redisMock.ping.mockRejectedValueOnce(new Error('ECONNREFUSED'));
      const unreachable = new RedisCounterStoreAdapter({
        client: redisMock as unknown as Redis,
      });

      await expect(unreachable.initialize()).rejects.toThrow('ECONNREFUSED');
      expect(unreachable.isInitialized()).toBe(false);
      expect(redisMock.disconnect).toHaveBeenCalledTimes(1);
    });

    it('should disconnect when the lazy connect fails', async () => {
      redisMock.status = 'wait';
      redisMock.connect.mockRejectedValueOnce(new Error('ECONNREFUSED'));
      const unreachable = new RedisCounterStoreAdapter({
        client: redisMock as unknown as Redis,
      });

      await expect(unreachable.initialize()).rejects.toThrow('ECONNREFUSED');
      expect(redisMock.ping).toHaveBeenCalledTimes(1);
      expect(redisMock.disconnect).toHaveBeenCalledTimes(1);
    });

    it('should log client errors', () => {
      const errorSpy = jest
        .spyOn(Logger.prototype, 'error')
        .mockImplementation(() => undefined);
      const [event, listener] = redisMock.on.mock.calls[0];

      listener(new Error('ECONNRESET'));

      expect(event).toBe('error');
      expect(errorSpy).toHaveBeenCalledWith('Redis client error: ECONNRESET');
      errorSpy.mockRestore();
    });
  });

  describe('increment', () => {
    it('should INCR the prefixed key', async () => {
      redisMock.incr.mockResolvedValue(3);

      expect(await adapter.increment('acct:1:w60:b5')).toBe(3);
      expect(redisMock.incr).toHaveBeenCalledWith('test:acct:1:w60:b5');
    });

    it('should wrap client errors as transient errors', async () => {
      redisMock.incr.mockRejectedValue(new Error('Command timed out'));

      const result = adapter.increment('k');

      await expect(result).rejects.toBeInstanceOf(TransientStoreError);
      await expect(result).rejects.toThrow('INCR failed: Command timed out');
    });

    it('should reject before initialize', async () => {
      const fresh = new RedisCounterStoreAdapter({
        client: redisMock as unknown as Redis,
      });

      await expect(fresh.increment('k')).rejects.toBeInstanceOf(
        StoreUninitializedError,
      );
      expect(redisMock.incr).not.toHaveBeenCalled();
    });
  });

  describe('addIfAbsent', () => {
    it('should SET NX with a millisecond TTL', async () => {
      redisMock.set.mockResolvedValue('OK');

      expect(await adapter.addIfAbsent('k', 1, 120)).toBe(true);
      expect(redisMock.set).toHaveBeenCalledWith(
        'test:k',
        1,
        'PX',
        120000,
        'NX',
      );
    });

    it('should return false when the key already exists', async () => {
      redisMock.set.mockResolvedValue(null);

      expect(await adapter.addIfAbsent('k', 1, 120)).toBe(false);
    });
  });

  describe('touch', () => {
    it('should PEXPIRE existing keys', async () => {
      redisMock.pexpire.mockResolvedValue(1);

      expect(await adapter.touch('k', 61)).toBe(TouchResult.TOUCHED);
      expect(redisMock.pexpire).toHaveBeenCalledWith('test:k', 61000);
    });

    it('should report missing keys', async () => {
      redisMock.pexpire.mockResolvedValue(0);

      expect(await adapter.touch('k', 61)).toBe(TouchResult.NOT_FOUND);
    });
  });

  describe('set', () => {
    it('should set with a TTL rounded up to milliseconds', async () => {
      redisMock.set.mockResolvedValue('OK');

      await adapter.set('k', 'v', 1.5);

      expect(redisMock.set).toHaveBeenCalledWith('test:k', 'v', 'PX', 1500);
    });

    it('should set without expiry for a zero TTL', async () => {
      redisMock.set.mockResolvedValue('OK');

      await adapter.set('k', 7, 0);

      expect(redisMock.set).toHaveBeenCalledWith('test:k', 7);
    });
  });

  describe('get', () => {
    it('should GET the prefixed key', async () => {
      redisMock.get.mockResolvedValue('12');

      expect(await adapter.get('k')).toBe('12');
      expect(redisMock.get).toHaveBeenCalledWith('test:k');
    });
  });

  describe('getMulti', () => {
    it('should MGET and leave out missing keys', async () => {
      redisMock.mget.mockResolvedValue(['1', null, '3']);

      const result = await adapter.getMulti(['a', 'b', 'c']);

      expect(redisMock.mget).toHaveBeenCalledWith(['test:a', 'test:b', 'test:c']);
      expect([...result.entries()]).toEqual([
        ['a', '1'],
        ['c', '3'],
      ]);
    });

    it('should not call the server for an empty key list', async () => {
      const result = await adapter.getMulti([]);

      expect(result.size).toBe(0);
      expect(redisMock.mget).not.toHaveBeenCalled();
    });

    it('should reject when MGET fails', async () => {
      redisMock.mget.mockRejectedValue(new Error('Connection is closed.'));

      await expect(adapter.getMulti(['a'])).rejects.toBeInstanceOf(
        TransientStoreError,
      );
    });
  });

  describe('cluster mode', () => {
    let cluster: Cluster;

    beforeEach(() => {
      cluster = new Cluster([{ host: '127.0.0.1', port: 7000 }], {
        lazyConnect: true,
      });
      jest.spyOn(cluster, 'connect').mockResolvedValue(undefined);
      jest.spyOn(cluster, 'ping').mockResolvedValue('PONG');
    });

    afterEach(() => {
      cluster.disconnect();
      jest.restoreAllMocks();
    });

    it('should read keys one by one and drop those whose node failed', async () => {
      const values: Record<string, string | null> = {
        'velocity:a': '2',
        'velocity:b': null,
        'velocity:d': '5',
      };
      jest.spyOn(cluster, 'get').mockImplementation(async (key) => {
        const name = key.toString();
        if (name === 'velocity:c') {
          throw new Error('CLUSTERDOWN');
        }
        return values[name] ?? null;
      });

      const clustered = new RedisCounterStoreAdapter({ client: cluster });
      await clustered.initialize();
      const result = await clustered.getMulti(['a', 'b', 'c', 'd']);

      expect([...result.entries()]).toEqual([
        ['a', '2'],
        ['d', '5'],
      ]);
    });
  });

  describe('cluster mode when every node fails', () => {
    let cluster: Cluster;

    beforeEach(() => {
      cluster = new Cluster([{ host: '127.0.0.1', port: 7000 }], {
        lazyConnect: true,
      });
      jest.spyOn(cluster, 'connect').mockResolvedValue(undefined);
      jest.spyOn(cluster, 'ping').mockResolvedValue('PONG');
      jest.spyOn(cluster, 'get').mockRejectedValue(new Error('CLUSTERDOWN'));
    });

    afterEach(() => {
      cluster.disconnect();
      jest.restoreAllMocks();
    });

    it('should reject instead of reporting an empty window', async () => {
      const clustered = new RedisCounterStoreAdapter({ client: cluster });
      await clustered.initialize();

      const result = clustered.getMulti(['a', 'b']);

      await expect(result).rejects.toBeInstanceOf(TransientStoreError);
      await expect(result).rejects.toThrow(
        'GET failed on every cluster node for 2 keys',
      );
    });
  });

  describe('close', () => {
    it('should quit the client', async () => {
      await adapter.close();

      expect(redisMock.quit).toHaveBeenCalledTimes(1);
      expect(adapter.isInitialized()).toBe(false);
    });

    it('should only disconnect a client that never initialized', async () => {
      const fresh = new RedisCounterStoreAdapter({
        client: redisMock as unknown as Redis,
      });

      await fresh.close();

      expect(redisMock.disconnect).toHaveBeenCalledTimes(1);
      expect(redisMock.quit).not.toHaveBeenCalled();
    });
  });
});
