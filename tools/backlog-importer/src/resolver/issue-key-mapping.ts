/**
 * Reference token → issue key lookup built up during one creation run.
 *
 * Tokens are epic prefixes (`PREP`), full issue titles, or issue keys mapped
 * to themselves. Entries are never removed; writing an existing token
 * replaces its key (last writer wins) but keeps its original position.
 */
export class IssueKeyMapping {
  private readonly keys = new Map<string, string>();

  constructor(initial: Iterable<readonly [string, string]> = []) {
    for (const [token, key] of initial) {
      this.keys.set(token, key);
    }
  }

  set(token: string, key: string): void {
    this.keys.set(token, key);
  }

  get(token: string): string | undefined {
    return this.keys.get(token);
  }

  has(token: string): boolean {
    return this.keys.has(token);
  }

  /** Entries in insertion order. */
  entries(): IterableIterator<[string, string]> {
    return this.keys.entries();
  }

  tokens(): string[] {
    return [...this.keys.keys()];
  }

  get size(): number {
    return this.keys.size;
  }

  toRecord(): Record<string, string> {
    return Object.fromEntries(this.keys);
  }
}
