import { ObjectConflictError } from '../errors.js';
import type { ObjectStore, ObjectSummary, PutObjectParams } from '../types.js';

/** 테스트용 in-process ObjectStore */
export class MemoryObjectStore implements ObjectStore {
  readonly objects = new Map<string, { body: string; params: PutObjectParams }>();
  readonly puts: PutObjectParams[] = [];

  async putObject(params: PutObjectParams): Promise<void> {
    this.puts.push(params);
    if (params.ifNoneMatch && this.objects.has(params.key)) {
      throw new ObjectConflictError(params.key);
    }
    this.objects.set(params.key, { body: params.body, params });
  }

  async getObject(key: string): Promise<string | null> {
    return this.objects.get(key)?.body ?? null;
  }

  async listObjects(prefix: string): Promise<ObjectSummary[]> {
    return [...this.objects.entries()]
      .filter(([key]) => key.startsWith(prefix))
      .map(([key, { body }]) => ({ key, size: body.length, lastModified: null }));
  }

  read(key: string): unknown {
    const body = this.objects.get(key)?.body;
    return body === undefined ? undefined : JSON.parse(body);
  }
}
