/**
 * Run summary: what a pipeline run wrote, skipped and failed.
 */

import type { AffectedEntity } from '../graph/types.js';
import type { LoadResult } from '../load/batch-loader.js';
import type { PassResult } from '../transform/types.js';

export type RunStatus = 'completed' | 'partial' | 'failed';

export interface FailedBatchReport {
  sequence: number;
  attempts: number;
  message: string;
  affectedEntities: AffectedEntity[];
}

export interface SkippedEntity {
  objectType: string;
  reason: string;
}

export interface RunSummary {
  status: RunStatus;
  documentName: string;
  /** Extraction stopped early because the document went away */
  aborted: boolean;
  abortReason?: string;
  entitiesExtracted: number;
  nodesCreated: number;
  nodesMerged: number;
  relationshipsCreated: number;
  relationshipsMerged: number;
  batchesCommitted: number;
  failedBatches: FailedBatchReport[];
  skippedEntities: SkippedEntity[];
  /** objectType -> count of entities handled by the fallback extractor */
  unrecognizedTypes: Record<string, number>;
  conflictingNodes: number;
  transform?: PassResult[];
  durationMs: number;
}

export interface ExtractionTally {
  documentName: string;
  aborted: boolean;
  abortReason?: string;
  entitiesExtracted: number;
  skippedEntities: SkippedEntity[];
  unrecognizedTypes: Record<string, number>;
  conflictingNodes: number;
}

/**
 * Fold load results and pass results into a summary.
 *
 * `failed` only when nothing committed and at least one batch failed;
 * `partial` when extraction aborted or any batch or pass failed.
 */
export function summarizeRun(
  tally: ExtractionTally,
  loads: readonly LoadResult[],
  transform: PassResult[] | undefined,
  durationMs: number
): RunSummary {
  const summary: RunSummary = {
    status: 'completed',
    ...tally,
    nodesCreated: 0,
    nodesMerged: 0,
    relationshipsCreated: 0,
    relationshipsMerged: 0,
    batchesCommitted: 0,
    failedBatches: [],
    transform,
    durationMs,
  };

  for (const load of loads) {
    if (load.status === 'committed') {
      summary.batchesCommitted++;
      summary.nodesCreated += load.nodesCreated;
      summary.nodesMerged += load.nodesMerged;
      summary.relationshipsCreated += load.relationshipsCreated;
      summary.relationshipsMerged += load.relationshipsMerged;
    } else {
      summary.failedBatches.push({
        sequence: load.sequence,
        attempts: load.attempts,
        message: load.error?.message ?? 'unknown error',
        affectedEntities: load.affectedEntities,
      });
    }
  }

  const transformFailed = (transform ?? []).some(pass => pass.status !== 'completed');
  if (summary.batchesCommitted === 0 && summary.failedBatches.length > 0) {
    summary.status = 'failed';
  } else if (tally.aborted || summary.failedBatches.length > 0 || transformFailed) {
    summary.status = 'partial';
  }
  return summary;
}

export interface FormatOptions {
  /** Max failed batches / skipped entities listed individually (default: 10) */
  maxListed?: number;
}

export function formatRunSummary(summary: RunSummary, options: FormatOptions = {}): string {
  const maxListed = options.maxListed ?? 10;
  const lines: string[] = [];

  lines.push(`Run ${summary.status} for "${summary.documentName}" in ${(summary.durationMs / 1000).toFixed(1)}s`);
  if (summary.aborted) {
    lines.push(`  Extraction aborted: ${summary.abortReason ?? 'document unavailable'}`);
  }
  lines.push(`  Entities extracted: ${summary.entitiesExtracted}`);
  lines.push(`  Nodes: ${summary.nodesCreated} created, ${summary.nodesMerged} merged`);
  lines.push(
    `  Relationships: ${summary.relationshipsCreated} created, ${summary.relationshipsMerged} merged`
  );
  lines.push(`  Batches: ${summary.batchesCommitted} committed, ${summary.failedBatches.length} failed`);

  for (const failed of summary.failedBatches.slice(0, maxListed)) {
    lines.push(
      `    - batch ${failed.sequence} (${failed.attempts} attempts, ${failed.affectedEntities.length} entities): ${failed.message}`
    );
  }

  if (summary.skippedEntities.length > 0) {
    lines.push(`  Skipped entities: ${summary.skippedEntities.length}`);
    for (const skipped of summary.skippedEntities.slice(0, maxListed)) {
      lines.push(`    - ${skipped.objectType}: ${skipped.reason}`);
    }
  }

  const unrecognized = Object.entries(summary.unrecognizedTypes);
  if (unrecognized.length > 0) {
    lines.push(
      `  Unrecognized types: ${unrecognized.map(([type, count]) => `${type} (${count})`).join(', ')}`
    );
  }
  if (summary.conflictingNodes > 0) {
    lines.push(`  Conflicting node emissions: ${summary.conflictingNodes}`);
  }

  for (const pass of summary.transform ?? []) {
    const failures = pass.batchesFailed > 0 ? `, ${pass.batchesFailed} batches failed` : '';
    const error = pass.error ? ` (${pass.error})` : '';
    lines.push(
      `  Transform ${pass.pass}: ${pass.status}, ${pass.relationshipsCreated} created, ${pass.relationshipsMerged} merged${failures}${error}`
    );
  }

  return lines.join('\n');
}
