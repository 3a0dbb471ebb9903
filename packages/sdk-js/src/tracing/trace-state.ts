/**
 * Vendor-specific key/value pairs carried unchanged along a trace.
 *
 * Entries keep their insertion order; replacing the value of an existing key
 * keeps its position. Every mutator returns a new instance.
 */
export class TraceState {
  private static readonly EMPTY = new TraceState(new Map());

  private readonly entriesMap: ReadonlyMap<string, string>;

  private constructor(entries: Map<string, string>) {
    this.entriesMap = entries;
    Object.freeze(this);
  }

  static empty(): TraceState {
    return TraceState.EMPTY;
  }

  static fromEntries(entries: Iterable<readonly [string, string]>): TraceState {
    const map = new Map<string, string>();
    for (const [key, value] of entries) {
      map.set(key, value);
    }
    return map.size === 0 ? TraceState.EMPTY : new TraceState(map);
  }

  get size(): number {
    return this.entriesMap.size;
  }

  get(key: string): string | undefined {
    return this.entriesMap.get(key);
  }

  has(key: string): boolean {
    return this.entriesMap.has(key);
  }

  set(key: string, value: string): TraceState {
    if (this.entriesMap.get(key) === value) return this;
    const map = new Map(this.entriesMap);
    map.set(key, value);
    return new TraceState(map);
  }

  delete(key: string): TraceState {
    if (!this.entriesMap.has(key)) return this;
    const map = new Map(this.entriesMap);
    map.delete(key);
    return map.size === 0 ? TraceState.EMPTY : new TraceState(map);
  }

  keys(): string[] {
    return [...this.entriesMap.keys()];
  }

  entries(): Array<[string, string]> {
    return [...this.entriesMap.entries()];
  }

  isEmpty(): boolean {
    return this.entriesMap.size === 0;
  }
}
