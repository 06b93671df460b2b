import { KeyValueStore } from '../storage/types';

const NAMESPACE = 'remote_versions';

/**
 * Last remote `lastUpdate` this client observed per record. Used as the
 * expected version of the next conditional write.
 */
export class VersionTracker {
  constructor(private readonly kv: KeyValueStore) {}

  async get(collection: string, id: string): Promise<string | null> {
    return this.kv.getString(this.key(collection, id));
  }

  async set(collection: string, id: string, version: string | null): Promise<void> {
    if (version === null) {
      await this.kv.remove(this.key(collection, id));
      return;
    }
    await this.kv.setString(this.key(collection, id), version);
  }

  async clear(collection: string): Promise<number> {
    const prefix = `${NAMESPACE}:${collection}:`;
    const keys = [...(await this.kv.getAllKeys())].filter((k) => k.startsWith(prefix));
    await Promise.all(keys.map((k) => this.kv.remove(k)));
    return keys.length;
  }

  private key(collection: string, id: string): string {
    return `${NAMESPACE}:${collection}:${id}`;
  }
}
