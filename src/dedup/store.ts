export interface DedupStore {
  has(articleId: string): Promise<boolean>;
  mark(articleId: string): Promise<void>;
}

export class InMemoryDedupStore implements DedupStore {
  private readonly seen: Set<string>;

  constructor(seen: Iterable<string> = []) {
    this.seen = new Set(seen);
  }

  async has(articleId: string): Promise<boolean> {
    return this.seen.has(articleId);
  }

  async mark(articleId: string): Promise<void> {
    this.seen.add(articleId);
  }

  get size(): number {
    return this.seen.size;
  }
}
