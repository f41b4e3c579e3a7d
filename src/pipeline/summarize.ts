/**
 * Summary Builder
 *
 * One row per reconciled record, input order kept. Where several sources
 * could supply a field, sources are consulted in SOURCE_PRIORITY order; within
 * a source the best call comes first, then its other calls in canonical order.
 * The first non-missing value wins.
 */

import { SOURCE_PRIORITY } from '../config/defaults.js';
import { formatBreakpoint } from '../domain/identity.js';
import type {
  FusionCall,
  FusionRecord,
  SourceName,
  SummaryField,
  SummaryRow,
} from '../domain/types.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('summarize');

interface Selection<T> {
  value: T | null;
  source: SourceName | null;
}

function callsInPrecedence(record: FusionRecord, source: SourceName): FusionCall[] {
  const best = record.best_calls[source];
  const rest = (record.calls[source] ?? []).filter((call) => call !== best);
  return best ? [best, ...rest] : rest;
}

export function selectByPrecedence<T>(
  record: FusionRecord,
  read: (call: FusionCall) => T | null
): Selection<T> {
  for (const source of SOURCE_PRIORITY) {
    for (const call of callsInPrecedence(record, source)) {
      const value = read(call);
      if (value !== null) return { value, source };
    }
  }
  return { value: null, source: null };
}

export function summarizeRecord(record: FusionRecord): SummaryRow {
  // Both partners come from the same call so they describe one event
  const breakpoints = selectByPrecedence(record, (call) =>
    call.identity.breakpoint_a || call.identity.breakpoint_b
      ? { a: call.identity.breakpoint_a, b: call.identity.breakpoint_b }
      : null
  );
  const junction = selectByPrecedence(record, (call) => call.evidence.junction_reads);
  const spanning = selectByPrecedence(record, (call) => call.evidence.spanning_frags);
  const ffpm = selectByPrecedence(record, (call) => call.evidence.ffpm);
  const frame = selectByPrecedence(record, (call) => call.frame);

  const field_sources: Record<SummaryField, SourceName | null> = {
    breakpoints: breakpoints.source,
    junction_reads: junction.source,
    spanning_frags: spanning.source,
    ffpm: ffpm.source,
    frame: frame.source,
  };

  const specimens = new Set<string>();
  for (const source of record.sources) {
    for (const call of record.calls[source] ?? []) {
      if (call.specimen_id) specimens.add(call.specimen_id);
    }
  }

  return {
    fusion_name: record.fusion_name,
    gene_a: record.identity.gene_a,
    gene_b: record.identity.gene_b,
    breakpoint_a: formatBreakpoint(breakpoints.value?.a ?? null),
    breakpoint_b: formatBreakpoint(breakpoints.value?.b ?? null),
    junction_reads: junction.value,
    spanning_frags: spanning.value,
    ffpm: ffpm.value,
    frame: frame.value,
    field_sources,
    sources: record.sources,
    specimens: [...specimens].sort(),
    historical_count: record.historical_count,
    reference_sources: record.reference_hits.map((hit) => hit.provenance),
    previous_positive_specimens: record.previous_positive_specimens,
    is_recurrent: record.historical_count > 0,
    is_known: record.reference_hits.length > 0,
    is_previously_reported: record.is_previous_positive,
    breakpoints_concordant: record.breakpoints_concordant,
  };
}

export function summarize(records: readonly FusionRecord[]): SummaryRow[] {
  const rows = records.map(summarizeRecord);

  logger.info(
    {
      rows: rows.length,
      recurrent: rows.filter((r) => r.is_recurrent).length,
      known: rows.filter((r) => r.is_known).length,
      previously_reported: rows.filter((r) => r.is_previously_reported).length,
    },
    'Built summary'
  );

  return rows;
}
