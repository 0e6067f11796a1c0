import {
  classifyStoreError,
  DecodeError,
  failureActionFor,
  FailureAction,
  StoreErrorKind,
  StoreUninitializedError,
  TransientStoreError,
  wrapStoreCall,
} from '../store.errors';

describe('store errors', () => {
  describe('classifyStoreError', () => {
    it('should keep the kind of store errors', () => {
      expect(classifyStoreError(new StoreUninitializedError('Store'))).toBe(
        StoreErrorKind.UNINITIALIZED,
      );
      expect(classifyStoreError(new DecodeError('k', 'x', 'integer'))).toBe(
        StoreErrorKind.DECODE,
      );
      expect(classifyStoreError(new TransientStoreError('timeout'))).toBe(
        StoreErrorKind.TRANSIENT,
      );
    });

    it('should treat anything else as transient', () => {
      expect(classifyStoreError(new Error('ECONNRESET'))).toBe(
        StoreErrorKind.TRANSIENT,
      );
      expect(classifyStoreError('boom')).toBe(StoreErrorKind.TRANSIENT);
    });
  });

  describe('failureActionFor', () => {
    it('should map each kind onto its policy', () => {
      expect(failureActionFor(new StoreUninitializedError('Store'))).toBe(
        FailureAction.RETURN_DEFAULT,
      );
      expect(failureActionFor(new Error('timeout'))).toBe(
        FailureAction.RETRY_ONCE,
      );
      expect(failureActionFor(new DecodeError('k', 'x', 'integer'))).toBe(
        FailureAction.SKIP,
      );
    });
  });

  describe('wrapStoreCall', () => {
    it('should pass results through', async () => {
      await expect(wrapStoreCall('GET', async () => 'value')).resolves.toBe(
        'value',
      );
    });

    it('should wrap client errors as transient errors', async () => {
      const cause = new Error('Command timed out');
      const call = wrapStoreCall('INCR', () => Promise.reject(cause));

      await expect(call).rejects.toBeInstanceOf(TransientStoreError);
      await expect(call).rejects.toMatchObject({
        message: 'INCR failed: Command timed out',
        cause,
      });
    });

    it('should not rewrap store errors', async () => {
      const error = new StoreUninitializedError('Store');

      await expect(
        wrapStoreCall('GET', () => Promise.reject(error)),
      ).rejects.toBe(error);
    });
  });

  it('should name errors after their class', () => {
    expect(new StoreUninitializedError('RedisStore')).toMatchObject({
      name: 'StoreUninitializedError',
      message: 'RedisStore has not been initialized',
    });
  });
});
