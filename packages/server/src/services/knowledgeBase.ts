import { EMPTY_SUMMARY_PLACEHOLDER, NO_WEB_CONTEXT_MARKER } from '@coursewright/shared';

export interface SourceSummary {
  readonly url: string;
  readonly summary: string;
}

/**
 * Cumulative context built from source summaries, in source order.
 * Append-only: `append` returns a new instance and never alters this one.
 */
export class KnowledgeBase {
  private constructor(readonly entries: readonly SourceSummary[]) {}

  static empty(): KnowledgeBase {
    return new KnowledgeBase([]);
  }

  append(url: string, summary: string): KnowledgeBase {
    const text = summary.trim().length > 0 ? summary : EMPTY_SUMMARY_PLACEHOLDER;
    return new KnowledgeBase([...this.entries, { url, summary: text }]);
  }

  get isEmpty(): boolean {
    return this.entries.length === 0;
  }

  /** Text block concatenating every source, as embedded into prompts. */
  render(): string {
    return this.entries.map((e) => `--- Source from ${e.url} ---\n${e.summary}\n\n`).join('');
  }

  /** Prompt context: the rendered sources, or the no-context marker when empty. */
  toPromptContext(): string {
    return this.isEmpty ? NO_WEB_CONTEXT_MARKER : this.render();
  }
}
