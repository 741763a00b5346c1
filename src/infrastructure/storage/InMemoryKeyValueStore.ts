import { IKeyValueStore } from './IKeyValueStore.js';

// in-memory store for tests and ephemeral sessions
export class InMemoryKeyValueStore implements IKeyValueStore {
  private entries: Map<string, string>;

  constructor(initial?: Record<string, string>) {
    this.entries = new Map(Object.entries(initial ?? {}));
  }

  getItem(key: string): string | null {
    return this.entries.get(key) ?? null;
  }

  setItem(key: string, value: string): void {
    this.entries.set(key, value);
  }

  // Utility methods for testing
  size(): number {
    return this.entries.size;
  }

  clearAll(): void {
    this.entries.clear();
  }
}
