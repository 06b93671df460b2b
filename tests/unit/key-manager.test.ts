import { KeyManager, KEY_SLOT, PREVIOUS_KEY_SLOT } from '../../src/security/key-manager';
import { InMemorySecureStore } from '../../src/storage/secure-store';
import { SecureStore } from '../../src/storage/types';
import { KeyStorageError } from '../../src/core/errors';

// Mock logger
jest.mock('../../src/observability/logger', () => {
  const log = { debug: jest.fn(), info: jest.fn(), warn: jest.fn(), error: jest.fn(), fatal: jest.fn() };
  const child = () => log;
  return { logger: { ...log, child }, componentLogger: child };
});

const noDelay = { maxAttempts: 3, initialDelayMs: 0 };

class BrokenSecureStore implements SecureStore {
  reads = 0;

  async read(): Promise<Buffer | null> {
    this.reads++;
    throw new Error('keystore locked');
  }

  async write(): Promise<void> {
    throw new Error('keystore locked');
  }

  async delete(): Promise<void> {
    throw new Error('keystore locked');
  }
}

describe('KeyManager', () => {
  let store: InMemorySecureStore;

  beforeEach(() => {
    store = new InMemorySecureStore();
  });

  it('should generate and persist a 32-byte key on first run', async () => {
    const manager = new KeyManager(store, noDelay);
    await manager.initialize();

    const stored = await store.read(KEY_SLOT);
    expect(manager.isInitialized()).toBe(true);
    expect(manager.getKey()).toHaveLength(32);
    expect(stored?.equals(manager.getKey())).toBe(true);
    expect(manager.getPreviousKey()).toBeNull();
  });

  it('should load the same key on the next start', async () => {
    const first = new KeyManager(store, noDelay);
    await first.initialize();
    const second = new KeyManager(store, noDelay);
    await second.initialize();

    expect(second.getKey().equals(first.getKey())).toBe(true);
  });

  it('should reject a stored key of the wrong length', async () => {
    await store.write(KEY_SLOT, Buffer.alloc(16, 1));
    const manager = new KeyManager(store, noDelay);

    await expect(manager.initialize()).rejects.toBeInstanceOf(KeyStorageError);
    expect(manager.isInitialized()).toBe(false);
  });

  it('should retry storage failures and then stay uninitialized', async () => {
    const broken = new BrokenSecureStore();
    const manager = new KeyManager(broken, noDelay);

    await expect(manager.initialize()).rejects.toBeInstanceOf(KeyStorageError);
    expect(broken.reads).toBe(3);
    expect(manager.isInitialized()).toBe(false);
    expect(() => manager.getKey()).toThrow(KeyStorageError);
  });

  it('should throw when the key is used before initialize', () => {
    const manager = new KeyManager(store, noDelay);
    expect(() => manager.getKey()).toThrow(KeyStorageError);
  });

  describe('rotate', () => {
    it('should move the current key to the backup slot and install a new one', async () => {
      const manager = new KeyManager(store, noDelay);
      await manager.initialize();
      const original = Buffer.from(manager.getKey());

      await manager.rotate();

      expect(manager.getKey().equals(original)).toBe(false);
      expect(manager.getPreviousKey()?.equals(original)).toBe(true);
      expect((await store.read(PREVIOUS_KEY_SLOT))?.equals(original)).toBe(true);
      expect((await store.read(KEY_SLOT))?.equals(manager.getKey())).toBe(true);
    });

    it('should restore both keys after a restart', async () => {
      const manager = new KeyManager(store, noDelay);
      await manager.initialize();
      await manager.rotate();

      const restarted = new KeyManager(store, noDelay);
      await restarted.initialize();

      expect(restarted.getKey().equals(manager.getKey())).toBe(true);
      expect(restarted.getPreviousKey()?.equals(manager.getPreviousKey() ?? Buffer.alloc(0))).toBe(true);
    });

    it('should forget the previous key when discarded', async () => {
      const manager = new KeyManager(store, noDelay);
      await manager.initialize();
      await manager.rotate();

      await manager.discardPreviousKey();

      expect(manager.getPreviousKey()).toBeNull();
      expect(await store.read(PREVIOUS_KEY_SLOT)).toBeNull();
    });
  });
});
