/**
 * Local record tier: full records as JSON under
 * `<namespace>:<collection>:<id>` in the persistent KV.
 * The encrypted and the unencrypted tiers are two instances with
 * different namespaces.
 */

import { FieldMap } from '../core/types';
import { parseFieldMap } from '../core/field-map';
import { CacheIOError } from '../core/errors';
import { KeyValueStore } from '../storage/types';

export const ENCRYPTED_NAMESPACE = 'local_records';
export const PLAIN_NAMESPACE = 'unencrypted_records';

export class LocalRecordStore {
  constructor(
    private readonly kv: KeyValueStore,
    private readonly namespace: string,
  ) {}

  /** null when absent or not a decodable record */
  async get(collection: string, id: string): Promise<FieldMap | null> {
    const raw = await this.kv.getString(this.key(collection, id));
    return raw === null ? null : parseFieldMap(raw);
  }

  async put(collection: string, id: string, fields: FieldMap): Promise<void> {
    if (!(await this.kv.setString(this.key(collection, id), JSON.stringify(fields)))) {
      throw new CacheIOError(`Store rejected ${this.namespace} write for ${collection}/${id}`);
    }
  }

  async delete(collection: string, id: string): Promise<void> {
    await this.kv.remove(this.key(collection, id));
  }

  async ids(collection: string): Promise<string[]> {
    const prefix = this.collectionPrefix(collection);
    const keys = await this.kv.getAllKeys();
    return [...keys].filter((k) => k.startsWith(prefix)).map((k) => k.slice(prefix.length));
  }

  async list(collection: string): Promise<Array<{ id: string; fields: FieldMap }>> {
    const records: Array<{ id: string; fields: FieldMap }> = [];
    for (const id of await this.ids(collection)) {
      const fields = await this.get(collection, id);
      if (fields) records.push({ id, fields });
    }
    return records;
  }

  async clear(collection: string): Promise<number> {
    const ids = await this.ids(collection);
    await Promise.all(ids.map((id) => this.delete(collection, id)));
    return ids.length;
  }

  private collectionPrefix(collection: string): string {
    return `${this.namespace}:${collection}:`;
  }

  private key(collection: string, id: string): string {
    return `${this.collectionPrefix(collection)}${id}`;
  }
}
