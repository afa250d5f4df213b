export const ARTIFACTS_HEADING = '## F-Ops Dry-Run Artifacts';
export const ARTIFACTS_FOOTER = '---\n*Generated by F-Ops Pipeline Agent*';

const titleCase = (key: string) =>
  key
    .split(/[_\-\s]+/)
    .filter((word) => word.length > 0)
    .map((word) => word[0].toUpperCase() + word.slice(1))
    .join(' ');

// A fence longer than any backtick run inside the block.
function fenceFor(content: string): string {
  const longest = Math.max(0, ...Array.from(content.matchAll(/`+/g), (m) => m[0].length));
  return '`'.repeat(Math.max(3, longest + 1));
}

export function formatArtifactComment(artifacts: Record<string, unknown>): string {
  let comment = `${ARTIFACTS_HEADING}\n\n`;

  for (const [key, value] of Object.entries(artifacts)) {
    const isText = typeof value === 'string';
    const content = isText ? value : (JSON.stringify(value, null, 2) ?? String(value));
    const fence = fenceFor(content);
    comment += `### ${titleCase(key)}\n\n${fence}${isText ? '' : 'json'}\n${content}\n${fence}\n\n`;
  }

  return comment + ARTIFACTS_FOOTER;
}

/** `YYYYMMDD-HHMMSS` in UTC. */
export function branchTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10).replace(/-/g, '')}-${iso.slice(11, 19).replace(/:/g, '')}`;
}

export function encodePath(path: string): string {
  return path.split('/').map(encodeURIComponent).join('/');
}
