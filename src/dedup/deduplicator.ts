import { DedupMarkFailed } from "../core/errors";
import type { DedupStore } from "./store";

export class Deduplicator {
  private readonly inFlight = new Set<string>();

  constructor(private readonly store: DedupStore) {}

  /**
   * Reserves an article for this process. The reservation is taken before the
   * store is consulted, so two workers racing on one id cannot both win.
   */
  async claim(articleId: string): Promise<boolean> {
    if (this.inFlight.has(articleId)) {
      return false;
    }
    this.inFlight.add(articleId);

    try {
      if (await this.store.has(articleId)) {
        this.inFlight.delete(articleId);
        return false;
      }
    } catch (error) {
      this.inFlight.delete(articleId);
      throw error;
    }

    return true;
  }

  /**
   * Call only after the article's result was folded. The in-process
   * reservation is kept, so the id stays claimed for the rest of the run even
   * when the store write fails.
   */
  async commit(articleId: string): Promise<DedupMarkFailed | null> {
    try {
      await this.store.mark(articleId);
      return null;
    } catch (error) {
      return new DedupMarkFailed(articleId, { cause: error });
    }
  }

  release(articleId: string): void {
    this.inFlight.delete(articleId);
  }
}
