export interface BlockEntry {
  /** Block name as first written in the document */
  name: string;
  multi: boolean;
  content: string;
}

/**
 * Ordered name → content mapping with the insertion policy of block
 * definitions: for a single-value name the first definition wins; for a
 * multi-value name later definitions are appended, newline-joined, in
 * document order. Names compare case-insensitively; single and multi
 * entries of the same base name are independent.
 */
export class BlockMap {
  private readonly entries = new Map<string, BlockEntry>();

  constructor(private readonly splitChar: string) {}

  /**
   * @returns true when the definition changed the map
   */
  define(name: string, content: string, multi: boolean): boolean {
    const id = BlockMap.id(name, multi);
    const existing = this.entries.get(id);
    if (!existing) {
      this.entries.set(id, { name, multi, content });
      return true;
    }
    if (!multi) {
      return false;
    }
    existing.content = `${existing.content}\n${content}`;
    return true;
  }

  get(name: string, multi: boolean): string | undefined {
    return this.entries.get(BlockMap.id(name, multi))?.content;
  }

  has(name: string, multi: boolean): boolean {
    return this.entries.has(BlockMap.id(name, multi));
  }

  get size(): number {
    return this.entries.size;
  }

  /** Display key: the name, plus a trailing separator for multi-value blocks. */
  keyOf(entry: BlockEntry): string {
    return entry.multi ? entry.name + this.splitChar : entry.name;
  }

  values(): BlockEntry[] {
    return Array.from(this.entries.values(), entry => ({ ...entry }));
  }

  singleNames(): string[] {
    return this.values().filter(entry => !entry.multi).map(entry => entry.name);
  }

  toRecord(): Record<string, string> {
    const record: Record<string, string> = {};
    for (const entry of this.entries.values()) {
      record[this.keyOf(entry)] = entry.content;
    }
    return record;
  }

  private static id(name: string, multi: boolean): string {
    return `${multi ? 'multi' : 'single'}:${name.toLowerCase()}`;
  }
}
