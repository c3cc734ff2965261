/**
 * Mapping store implementations
 *
 * Records are keyed by (scope, repoPath) and are never deleted: a path that
 * leaves the repository keeps its record so a later return can reuse the
 * entity.
 */

import { compareOrdinal } from '../reconcilers/tree/classify.js';
import {
  JsonFile,
  expectArray,
  expectNullableString,
  expectRecord,
  expectString,
} from './json-file.js';
import {
  systemClock,
  type Clock,
  type MappingFields,
  type MappingRecord,
  type MappingStore,
} from './types.js';

/**
 * Apply the non-null fields of an upsert to a record
 */
export function mergeMapping(
  existing: MappingRecord | null,
  scope: string,
  repoPath: string,
  fields: MappingFields,
  now: string
): MappingRecord {
  const base: MappingRecord = existing ?? {
    scope,
    repoPath,
    entityId: null,
    parentEntityId: null,
    contentHash: null,
    importKey: null,
    createdAt: now,
    modifiedAt: now,
  };

  return {
    ...base,
    entityId: fields.entityId ?? base.entityId,
    parentEntityId: fields.parentEntityId ?? base.parentEntityId,
    contentHash: fields.contentHash ?? base.contentHash,
    importKey: fields.importKey ?? base.importKey,
    modifiedAt: now,
  };
}

// =============================================================================
// In-Memory Store
// =============================================================================

export class MemoryMappingStore implements MappingStore {
  protected readonly scopes = new Map<string, Map<string, MappingRecord>>();

  constructor(protected readonly clock: Clock = systemClock) {}

  async lookup(scope: string, repoPath: string): Promise<MappingRecord | null> {
    const record = this.scopes.get(scope)?.get(repoPath);
    return record ? { ...record } : null;
  }

  async upsert(scope: string, repoPath: string, fields: MappingFields): Promise<MappingRecord> {
    let records = this.scopes.get(scope);
    if (!records) {
      records = new Map();
      this.scopes.set(scope, records);
    }

    const merged = mergeMapping(
      records.get(repoPath) ?? null,
      scope,
      repoPath,
      fields,
      this.clock().toISOString()
    );
    records.set(repoPath, merged);
    await this.persist();
    return { ...merged };
  }

  async list(scope: string): Promise<MappingRecord[]> {
    const records = this.scopes.get(scope);
    if (!records) return [];
    return [...records.values()]
      .sort((a, b) => compareOrdinal(a.repoPath, b.repoPath))
      .map((record) => ({ ...record }));
  }

  /** Called after every mutation */
  protected async persist(): Promise<void> {}
}

// =============================================================================
// JSON File Store
// =============================================================================

interface MappingDocument {
  version: 1;
  scopes: Record<string, MappingRecord[]>;
}

function decodeMappingDocument(raw: unknown, filePath: string): MappingDocument {
  const root = expectRecord(raw, 'document', filePath);
  const scopes = expectRecord(root.scopes ?? {}, 'scopes', filePath);
  const result: Record<string, MappingRecord[]> = {};

  for (const [scope, value] of Object.entries(scopes)) {
    result[scope] = expectArray(value, `scopes.${scope}`, filePath).map((item, index) => {
      const where = `scopes.${scope}[${index}]`;
      const record = expectRecord(item, where, filePath);
      return {
        scope,
        repoPath: expectString(record.repoPath, `${where}.repoPath`, filePath),
        entityId: expectNullableString(record.entityId, `${where}.entityId`, filePath),
        parentEntityId: expectNullableString(record.parentEntityId, `${where}.parentEntityId`, filePath),
        contentHash: expectNullableString(record.contentHash, `${where}.contentHash`, filePath),
        importKey: expectNullableString(record.importKey, `${where}.importKey`, filePath),
        createdAt: expectString(record.createdAt, `${where}.createdAt`, filePath),
        modifiedAt: expectString(record.modifiedAt, `${where}.modifiedAt`, filePath),
      };
    });
  }

  return { version: 1, scopes: result };
}

/**
 * Mapping store backed by a single JSON file, loaded once and written
 * through on every upsert
 */
export class JsonMappingStore extends MemoryMappingStore {
  private constructor(
    private readonly file: JsonFile<MappingDocument>,
    clock: Clock
  ) {
    super(clock);
  }

  static async open(filePath: string, clock: Clock = systemClock): Promise<JsonMappingStore> {
    const file = new JsonFile<MappingDocument>(filePath, decodeMappingDocument, () => ({
      version: 1 as const,
      scopes: {},
    }));
    const store = new JsonMappingStore(file, clock);
    const document = await file.read();
    for (const [scope, records] of Object.entries(document.scopes)) {
      store.scopes.set(scope, new Map(records.map((record) => [record.repoPath, record])));
    }
    return store;
  }

  protected override async persist(): Promise<void> {
    const scopes: Record<string, MappingRecord[]> = {};
    for (const scope of [...this.scopes.keys()].sort(compareOrdinal)) {
      scopes[scope] = await this.list(scope);
    }
    await this.file.write({ version: 1, scopes });
  }
}
