/**
 * Per-scope snapshot identity and last run time
 */

import { JsonFile, expectNullableString, expectRecord } from './json-file.js';
import type { ScopeState, ScopeStateStore } from './types.js';

export class MemoryScopeStateStore implements ScopeStateStore {
  protected readonly states = new Map<string, ScopeState>();

  async get(scope: string): Promise<ScopeState> {
    const state = this.states.get(scope);
    return state ? { ...state } : { scope, lastSnapshot: null, lastRunAt: null };
  }

  async recordSnapshot(scope: string, snapshot: string, at: string): Promise<void> {
    this.states.set(scope, { scope, lastSnapshot: snapshot, lastRunAt: at });
    await this.persist();
  }

  protected async persist(): Promise<void> {}
}

interface ScopeDocument {
  version: 1;
  scopes: Record<string, { lastSnapshot: string | null; lastRunAt: string | null }>;
}

function decodeScopeDocument(raw: unknown, filePath: string): ScopeDocument {
  const root = expectRecord(raw, 'document', filePath);
  const scopes = expectRecord(root.scopes ?? {}, 'scopes', filePath);
  const result: ScopeDocument['scopes'] = {};
  for (const [scope, value] of Object.entries(scopes)) {
    const state = expectRecord(value, `scopes.${scope}`, filePath);
    result[scope] = {
      lastSnapshot: expectNullableString(state.lastSnapshot, `scopes.${scope}.lastSnapshot`, filePath),
      lastRunAt: expectNullableString(state.lastRunAt, `scopes.${scope}.lastRunAt`, filePath),
    };
  }
  return { version: 1, scopes: result };
}

export class JsonScopeStateStore extends MemoryScopeStateStore {
  private constructor(private readonly file: JsonFile<ScopeDocument>) {
    super();
  }

  static async open(filePath: string): Promise<JsonScopeStateStore> {
    const file = new JsonFile<ScopeDocument>(filePath, decodeScopeDocument, () => ({
      version: 1 as const,
      scopes: {},
    }));
    const store = new JsonScopeStateStore(file);
    const document = await file.read();
    for (const [scope, state] of Object.entries(document.scopes)) {
      store.states.set(scope, { scope, ...state });
    }
    return store;
  }

  protected override async persist(): Promise<void> {
    const scopes: ScopeDocument['scopes'] = {};
    for (const [scope, state] of this.states) {
      scopes[scope] = { lastSnapshot: state.lastSnapshot, lastRunAt: state.lastRunAt };
    }
    await this.file.write({ version: 1, scopes });
  }
}
