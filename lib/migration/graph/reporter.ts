/**
 * Run reporting
 * Per-type summary of a two-phase run
 */

import type { EntityType } from '../../store/types';
import { formatDuration } from '../logging';
import type { BackpatchResult } from './backpatch';
import type { DummyPurgeResult } from './dummy-registry';
import type { MigrationFailure } from './failure-logger';
import type { MaterializerStats } from './materializer';

export interface EntityTypeSummary {
  created: number;
  adopted: number;
  failed: number;
  updated: number;
  skipped: number;
  errored: number;
  fieldErrors: number;
}

export interface MigrationRunReport {
  runId: string;
  status: 'completed' | 'partial';
  startedAt: string;
  completedAt: string;
  duration: string;
  entitiesByType: Record<EntityType, EntityTypeSummary>;
  totals: EntityTypeSummary;
  placeholders: DummyPurgeResult | null;
  resolutionMisses: number;
  topErrors: string[];
  recommendations: string[];
}

export interface RunReportInput {
  runId: string;
  startedAt: Date;
  completedAt: Date;
  entityTypes: EntityType[];
  phase1: Record<EntityType, MaterializerStats>;
  phase2: BackpatchResult[];
  failures: MigrationFailure[];
  placeholders: DummyPurgeResult | null;
}

const SUMMARY_KEYS: Array<keyof EntityTypeSummary> = [
  'created',
  'adopted',
  'failed',
  'updated',
  'skipped',
  'errored',
  'fieldErrors',
];

function emptySummary(): EntityTypeSummary {
  return { created: 0, adopted: 0, failed: 0, updated: 0, skipped: 0, errored: 0, fieldErrors: 0 };
}

export function createRunReport(input: RunReportInput): MigrationRunReport {
  const entitiesByType: Record<EntityType, EntityTypeSummary> = {};
  const totals = emptySummary();

  const summaryFor = (entityType: EntityType): EntityTypeSummary => {
    let summary = entitiesByType[entityType];
    if (!summary) {
      summary = emptySummary();
      entitiesByType[entityType] = summary;
    }
    return summary;
  };

  for (const entityType of input.entityTypes) {
    summaryFor(entityType);
  }

  for (const [entityType, stats] of Object.entries(input.phase1)) {
    const summary = summaryFor(entityType);
    summary.created += stats.created;
    summary.adopted += stats.adopted;
    summary.failed += stats.failed;
  }

  for (const result of input.phase2) {
    const summary = summaryFor(result.entityType);
    summary.updated += result.updated;
    summary.skipped += result.skipped;
    summary.errored += result.errored;
    summary.fieldErrors += result.fieldErrors;
  }

  for (const summary of Object.values(entitiesByType)) {
    for (const key of SUMMARY_KEYS) {
      totals[key] += summary[key];
    }
  }

  const resolutionMisses = input.failures.filter(failure => failure.kind === 'ResolutionMiss').length;
  const hardFailures = input.failures.filter(failure => failure.kind !== 'ResolutionMiss');
  const topErrors = Array.from(new Set(hardFailures.map(failure => `${failure.entityType}: ${failure.message}`))).slice(0, 5);

  const recommendations: string[] = [];
  if (totals.failed > 0) {
    recommendations.push(`Review ${totals.failed} records that could not be created and re-run with resume enabled`);
  }
  if (totals.fieldErrors > 0) {
    recommendations.push(`Correct ${totals.fieldErrors} reference fields that could not be backpatched`);
  }
  if (resolutionMisses > 0) {
    recommendations.push(`Create the ${resolutionMisses} missing category records in the target and re-run backpatch`);
  }
  if (input.placeholders && input.placeholders.failed.length > 0) {
    recommendations.push('Delete leftover placeholder records once nothing references them');
  }

  return {
    runId: input.runId,
    status: totals.failed > 0 || totals.errored > 0 ? 'partial' : 'completed',
    startedAt: input.startedAt.toISOString(),
    completedAt: input.completedAt.toISOString(),
    duration: formatDuration(input.completedAt.getTime() - input.startedAt.getTime()),
    entitiesByType,
    totals,
    placeholders: input.placeholders,
    resolutionMisses,
    topErrors,
    recommendations,
  };
}

const COLUMNS: Array<keyof EntityTypeSummary> = ['created', 'adopted', 'failed', 'updated', 'skipped', 'errored'];

/**
 * Fixed-width summary table
 */
export function formatRunReport(report: MigrationRunReport): string[] {
  const names = [...Object.keys(report.entitiesByType), 'TOTAL'];
  const nameWidth = Math.max(...names.map(name => name.length), 'Entity'.length);
  const row = (name: string, summary: EntityTypeSummary) =>
    [name.padEnd(nameWidth), ...COLUMNS.map(column => String(summary[column]).padStart(column.length))].join('  ');

  const lines = [
    `Run ${report.runId} ${report.status} in ${report.duration}`,
    ['Entity'.padEnd(nameWidth), ...COLUMNS].join('  '),
  ];

  for (const [entityType, summary] of Object.entries(report.entitiesByType)) {
    lines.push(row(entityType, summary));
  }
  lines.push(row('TOTAL', report.totals));

  return lines;
}
