/**
 * Append-only sync history, one record per run
 */

import {
  JsonFile,
  expectArray,
  expectNullableString,
  expectNumber,
  expectRecord,
  expectString,
} from './json-file.js';
import type {
  NewSyncHistoryRecord,
  OperationLogEntry,
  SyncHistoryRecord,
  SyncHistoryStore,
  SyncStatus,
} from './types.js';
import { StateFileError } from '../errors.js';

const STATUSES: readonly SyncStatus[] = ['uptodate', 'success', 'failed'];

export class MemorySyncHistoryStore implements SyncHistoryStore {
  protected records: SyncHistoryRecord[] = [];

  async append(record: NewSyncHistoryRecord): Promise<SyncHistoryRecord> {
    const nextId = this.records.reduce((max, r) => Math.max(max, r.id), 0) + 1;
    const stored: SyncHistoryRecord = { id: nextId, ...record };
    this.records.push(stored);
    await this.persist();
    return structuredClone(stored);
  }

  async list(scope: string, limit?: number): Promise<SyncHistoryRecord[]> {
    const matching = this.records.filter((record) => record.scope === scope).reverse();
    return (limit === undefined ? matching : matching.slice(0, limit)).map((record) =>
      structuredClone(record)
    );
  }

  protected async persist(): Promise<void> {}
}

interface HistoryDocument {
  version: 1;
  records: SyncHistoryRecord[];
}

function decodeOperation(raw: unknown, where: string, filePath: string): OperationLogEntry {
  const entry = expectRecord(raw, where, filePath);
  return {
    kind: expectString(entry.kind, `${where}.kind`, filePath),
    path: expectString(entry.path, `${where}.path`, filePath),
    detail: expectString(entry.detail, `${where}.detail`, filePath),
    timestamp: expectString(entry.timestamp, `${where}.timestamp`, filePath),
  };
}

function decodeHistoryDocument(raw: unknown, filePath: string): HistoryDocument {
  const root = expectRecord(raw, 'document', filePath);
  const records = expectArray(root.records ?? [], 'records', filePath).map((item, index) => {
    const where = `records[${index}]`;
    const record = expectRecord(item, where, filePath);
    const status = STATUSES.find((candidate) => candidate === record.status);
    if (!status) {
      throw new StateFileError(filePath, `${where}.status must be one of ${STATUSES.join(', ')}`);
    }
    return {
      id: expectNumber(record.id, `${where}.id`, filePath),
      scope: expectString(record.scope, `${where}.scope`, filePath),
      triggeredBy: expectString(record.triggeredBy, `${where}.triggeredBy`, filePath),
      snapshotIdentity: expectNullableString(record.snapshotIdentity, `${where}.snapshotIdentity`, filePath),
      status,
      summary: expectString(record.summary, `${where}.summary`, filePath),
      operations: expectArray(record.operations ?? [], `${where}.operations`, filePath).map(
        (operation, opIndex) => decodeOperation(operation, `${where}.operations[${opIndex}]`, filePath)
      ),
      createdAt: expectString(record.createdAt, `${where}.createdAt`, filePath),
    };
  });
  return { version: 1, records };
}

export class JsonSyncHistoryStore extends MemorySyncHistoryStore {
  private constructor(private readonly file: JsonFile<HistoryDocument>) {
    super();
  }

  static async open(filePath: string): Promise<JsonSyncHistoryStore> {
    const file = new JsonFile(filePath, decodeHistoryDocument, () => ({
      version: 1 as const,
      records: [],
    }));
    const store = new JsonSyncHistoryStore(file);
    store.records = (await file.read()).records;
    return store;
  }

  protected override async persist(): Promise<void> {
    await this.file.write({ version: 1, records: this.records });
  }
}
