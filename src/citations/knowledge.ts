import type { FileSet } from '../sandbox/types.js';
import type { Citation } from './tracker.js';

export interface SearchResult {
  text: string;
  metadata: { source?: string; id?: string; title?: string };
  citation?: string;
}

/** Vector knowledge store; implemented outside this package. */
export interface KnowledgeStore {
  search(collection: string, query: string, k: number): Promise<SearchResult[]>;
}

/** Produces file sets from a prompt and its supporting sources; implemented outside this package. */
export interface Generator {
  generate(prompt: string, sources: readonly Citation[]): Promise<FileSet>;
}

const EXCERPT_LENGTH = 200;

export function citationsFromSearch(results: readonly SearchResult[]): Citation[] {
  return results.map((result, index) => ({
    sourceId: result.citation ?? result.metadata.id ?? result.metadata.source ?? `source-${index + 1}`,
    title: result.metadata.title ?? 'Untitled',
    excerpt: result.text.slice(0, EXCERPT_LENGTH),
  }));
}
