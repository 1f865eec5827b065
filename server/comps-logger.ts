/** One log line per comp search, from the Browse gateway or the pipeline's query fall-through. */

export type CompSearchSource = 'browse' | 'pipeline';

export interface CompSearchLog {
  source: CompSearchSource;
  /** Every query tried, in order. The gateway always logs one. */
  queries: string[];
  category?: string;
  resultsCount: number;
  error?: string;
  durationMs?: number;
  apiEndpoint?: string;
}

function quote(value: string): string {
  return `"${value.replace(/"/g, '\\"')}"`;
}

export function formatCompsLogLine(entry: CompSearchLog): string {
  const tag = entry.error ? 'ERROR' : entry.source.toUpperCase();

  const details = [
    entry.queries.length === 1
      ? `query=${quote(entry.queries[0])}`
      : `queries=[${entry.queries.map(quote).join(', ')}]`,
    entry.category ? `category=${quote(entry.category)}` : null,
    `results=${entry.resultsCount}`,
    entry.durationMs !== undefined ? `duration=${entry.durationMs}ms` : null,
    entry.apiEndpoint ? `endpoint=${entry.apiEndpoint}` : null,
    entry.error ? `error=${quote(entry.error)}` : null,
  ].filter((part): part is string => part !== null);

  return `[COMPS:${tag}] ${details.join(' | ')}`;
}

export function logCompsRequest(entry: CompSearchLog): void {
  const line = formatCompsLogLine(entry);
  if (entry.error) {
    console.error(line);
  } else {
    console.log(line);
  }
}
