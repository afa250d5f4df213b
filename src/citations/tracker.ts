import { createHash } from 'crypto';
import { createLogger, type Logger } from '../logger.js';

export interface Citation {
  /** Opaque knowledge-base reference. */
  sourceId: string;
  title: string;
  excerpt: string;
}

export interface BoundContent {
  content: string;
  /** SHA-256 hex of the content before the citation section was appended. */
  contentHash: string;
  citations: readonly Citation[];
}

export interface CitationCheck {
  hasCitations: boolean;
  citationCount: number;
  hasCitationSection: boolean;
  valid: boolean;
}

export const CITATION_HEADER = '# Citations';
const CITATION_LINE = /^# \[\d+\] /gm;

export const hashContent = (content: string): string =>
  createHash('sha256').update(content, 'utf8').digest('hex');

export function formatCitationList(citations: readonly Citation[]): string[] {
  return citations.map((c, i) => `[${i + 1}] ${c.sourceId}: ${c.title}`);
}

export class CitationTracker {
  private readonly logger: Logger;

  constructor(logger?: Logger) {
    this.logger = logger ?? createLogger('CitationTracker');
  }

  /** Appends a `# Citations` section in source order. Content is returned unchanged when there are no sources. */
  bind(content: string, sources: readonly Citation[]): BoundContent {
    const contentHash = hashContent(content);
    const citations = [...sources];
    if (citations.length === 0) {
      return { content, contentHash, citations };
    }

    const footer = [CITATION_HEADER, ...formatCitationList(citations).map((line) => `# ${line}`)].join('\n');
    this.logger.debug(`Bound ${citations.length} citation(s) to content ${contentHash.slice(0, 8)}`);

    return {
      content: `${content.replace(/\n$/, '')}\n\n${footer}\n`,
      contentHash,
      citations,
    };
  }

  validate(content: string): CitationCheck {
    const citationCount = content.match(CITATION_LINE)?.length ?? 0;
    const hasCitationSection = content.split('\n').some((line) => line.trim() === CITATION_HEADER);
    return {
      hasCitations: citationCount > 0,
      citationCount,
      hasCitationSection,
      valid: citationCount > 0 && hasCitationSection,
    };
  }
}

const COMMENT_EXTENSIONS = ['.tf', '.tfvars', '.hcl', '.yaml', '.yml', '.sh', '.py', '.toml'];

/** Files whose syntax takes `#` line comments, so a citation footer keeps them valid. */
export function acceptsHashComments(path: string): boolean {
  const base = path.split('/').pop() ?? path;
  if (base === 'Dockerfile' || base.startsWith('Dockerfile.')) return true;
  return COMMENT_EXTENSIONS.some((ext) => base.endsWith(ext));
}
