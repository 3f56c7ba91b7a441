// src/refactor/registry.ts
// In-memory store of script sources, keyed by source name

export class SourceRegistry {
  private readonly sources = new Map<string, string>();

  constructor(initial?: Iterable<readonly [string, string]>) {
    if (initial) {
      for (const [name, text] of initial) this.sources.set(name, text);
    }
  }

  get(name: string): string | undefined {
    return this.sources.get(name);
  }

  set(name: string, text: string): void {
    this.sources.set(name, text);
  }

  has(name: string): boolean {
    return this.sources.has(name);
  }

  /** Source names in registration order. */
  names(): string[] {
    return [...this.sources.keys()];
  }
}
