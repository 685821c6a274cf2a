import { WorkerResult } from './research-types';

export interface SourceEntry {
  url: string;
  task: string;
  agentId: string;
}

/**
 * Ordered, deduplicated table of source URLs across all worker results.
 *
 * Registration order is task order, then first-seen order within each result. The first
 * registration of a URL keeps its task and agent.
 */
export class SourceRegistry {
  private readonly entries = new Map<string, SourceEntry>();

  static fromResults(results: WorkerResult[]): SourceRegistry {
    const registry = new SourceRegistry();
    for (const result of results) {
      for (const url of result.sources) {
        registry.register(url, result.task, result.agentId);
      }
    }
    return registry;
  }

  /** Returns false when the URL was already registered or is empty. */
  register(url: string, task: string, agentId: string): boolean {
    if (!url || this.entries.has(url)) return false;
    this.entries.set(url, { url, task, agentId });
    return true;
  }

  get size(): number {
    return this.entries.size;
  }

  list(): SourceEntry[] {
    return Array.from(this.entries.values());
  }

  /** `[Source N] url` blocks with the related task and a fixed access date. */
  formatForPrompt(accessedDate: string): string {
    return this.list()
      .map((entry, i) => [`[Source ${i + 1}] ${entry.url}`, `  Related to: ${entry.task}`, `  Accessed: ${accessedDate}`].join('\n'))
      .join('\n\n');
  }
}
