// In-memory assembly of HTML dashboards submitted in several chunks

interface Draft {
  chunks: string[];
  updatedAt: number;
}

const DRAFT_TTL_MS = 30 * 60 * 1000;

export class HtmlDraftStore {
  private readonly drafts = new Map<string, Draft>();

  start(name: string, chunk: string): number {
    this.prune();
    this.drafts.set(name, { chunks: [chunk], updatedAt: Date.now() });
    return chunk.length;
  }

  /**
   * Returns the total assembled length, or null when no draft was started.
   */
  append(name: string, chunk: string): number | null {
    const draft = this.drafts.get(name);
    if (!draft) return null;
    draft.chunks.push(chunk);
    draft.updatedAt = Date.now();
    return draft.chunks.reduce((total, c) => total + c.length, 0);
  }

  take(name: string): string | null {
    const draft = this.drafts.get(name);
    if (!draft) return null;
    this.drafts.delete(name);
    return draft.chunks.join('');
  }

  private prune(): void {
    const cutoff = Date.now() - DRAFT_TTL_MS;
    for (const [name, draft] of this.drafts) {
      if (draft.updatedAt < cutoff) this.drafts.delete(name);
    }
  }
}
