import { AggregationError, ClassificationError, FetchError, ParseError } from './errors';
import type { BuildIssue, SnapshotResult } from './types';

export function issueFromError(
  error: unknown,
  itemType: BuildIssue['itemType'],
  itemId: string
): BuildIssue {
  let kind: BuildIssue['kind'] = 'unknown';
  if (error instanceof FetchError) kind = 'fetch';
  else if (error instanceof ParseError) kind = 'parse';
  else if (error instanceof ClassificationError) kind = 'classification';
  else if (error instanceof AggregationError) kind = 'aggregation';

  return {
    kind,
    itemType,
    itemId,
    message: error instanceof Error ? error.message : String(error),
  };
}

/** One-line status for whoever displays the snapshot. */
export function summarizeSnapshot(result: SnapshotResult): string {
  const { snapshot } = result;
  const skipped = snapshot.report.skipped.length;
  const anomalies = snapshot.report.anomalies.length;

  let summary = `Data last updated at ${snapshot.builtAt}; ${skipped} item${skipped === 1 ? '' : 's'} skipped due to fetch or parse errors`;
  if (anomalies > 0) {
    summary += `; ${anomalies} anomal${anomalies === 1 ? 'y' : 'ies'} recorded`;
  }
  if (result.stale) {
    summary += ` (stale: refresh failed - ${result.error.message})`;
  }
  return summary;
}
