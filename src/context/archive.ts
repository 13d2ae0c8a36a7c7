import type { ArchiveStore } from "./types.js";

export class MemoryArchiveStore implements ArchiveStore {
  private entries = new Map<number, string>();

  put(index: number, rawContent: string): void {
    this.entries.set(index, rawContent);
  }

  get(index: number): string | undefined {
    return this.entries.get(index);
  }

  has(index: number): boolean {
    return this.entries.has(index);
  }

  delete(index: number): void {
    this.entries.delete(index);
  }

  indices(): number[] {
    return [...this.entries.keys()].sort((a, b) => a - b);
  }
}
