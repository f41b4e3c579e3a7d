/**
 * Reconciler
 *
 * Groups calls from every source by gene pair and annotates each group with
 * historical recurrence, curated database hits and previous positives.
 *
 * Breakpoints never split a group: calls naming the same genes at different
 * positions stay together, and `breakpoints_concordant` reports whether every
 * pair of calls in the group would match under `identitiesMatch`. Calls under
 * each source are kept in a canonical order so a record's contents do not
 * depend on input order.
 */

import { PIPELINE_DEFAULTS, SOURCE_PRIORITY } from '../config/defaults.js';
import { formatBreakpoint, hasBreakpoints } from '../domain/identity.js';
import type {
  Breakpoint,
  CallsBySource,
  FusionCall,
  FusionIdentity,
  FusionRecord,
  HistoricalIndex,
  PositivesIndex,
  ReferenceIndex,
  SourceName,
} from '../domain/types.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('reconcile');

export interface ReconcileOptions {
  /** Max distance in bases for two breakpoints to count as the same position */
  breakpoint_tolerance: number;
}

export const DEFAULT_RECONCILE_OPTIONS: ReconcileOptions = {
  breakpoint_tolerance: PIPELINE_DEFAULTS.BREAKPOINT_TOLERANCE,
};

interface CallGroup {
  key: string;
  calls: Map<SourceName, FusionCall[]>;
}

export function reconcile(
  callsBySource: CallsBySource,
  reference: ReferenceIndex,
  historical: HistoricalIndex,
  positives: PositivesIndex,
  options: ReconcileOptions = DEFAULT_RECONCILE_OPTIONS
): FusionRecord[] {
  const groups = new Map<string, CallGroup>();

  for (const source of SOURCE_PRIORITY) {
    for (const call of callsBySource[source] ?? []) {
      const key = call.identity.key;
      let group = groups.get(key);
      if (!group) {
        group = { key, calls: new Map() };
        groups.set(key, group);
      }
      const source_calls = group.calls.get(source) ?? [];
      source_calls.push(call);
      group.calls.set(source, source_calls);
    }
  }

  const records = [...groups.values()].map((group) =>
    buildRecord(group, reference, historical, positives, options)
  );

  logger.info(
    {
      records: records.length,
      multi_source: records.filter((r) => r.sources.length > 1).length,
      discordant: records.filter((r) => !r.breakpoints_concordant).length,
    },
    'Reconciled fusion calls'
  );

  return records;
}

function buildRecord(
  group: CallGroup,
  reference: ReferenceIndex,
  historical: HistoricalIndex,
  positives: PositivesIndex,
  options: ReconcileOptions
): FusionRecord {
  const calls: Partial<Record<SourceName, readonly FusionCall[]>> = {};
  const best_calls: Partial<Record<SourceName, FusionCall>> = {};
  const sources: SourceName[] = [];

  for (const source of SOURCE_PRIORITY) {
    const source_calls = group.calls.get(source);
    if (!source_calls) continue;
    const ordered = [...source_calls].sort(compareCalls);
    calls[source] = ordered;
    best_calls[source] = pickBestCall(ordered);
    sources.push(source);
  }

  const all_calls = sources.flatMap((s) => calls[s] ?? []);
  const identity = representativeIdentity(sources.map((s) => best_calls[s]), all_calls[0].identity);
  const positive = positives.get(group.key);

  return {
    identity,
    fusion_name: identity.key,
    calls,
    best_calls,
    sources,
    historical_count: historical.observations.get(group.key)?.count ?? 0,
    reference_hits: reference.get(group.key) ?? [],
    is_previous_positive: positive !== undefined,
    previous_positive_specimens: positive?.specimens ?? [],
    breakpoints_concordant: allConcordant(all_calls, options.breakpoint_tolerance),
  };
}

function support(call: FusionCall): number {
  return (call.evidence.junction_reads ?? 0) + (call.evidence.spanning_frags ?? 0);
}

/**
 * Highest read support, then highest FFPM; ties keep canonical order.
 */
export function pickBestCall(calls: readonly FusionCall[]): FusionCall {
  let best = calls[0];
  for (const call of calls.slice(1)) {
    const by_support = support(call) - support(best);
    const by_ffpm = (call.evidence.ffpm ?? -1) - (best.evidence.ffpm ?? -1);
    if (by_support > 0 || (by_support === 0 && by_ffpm > 0)) {
      best = call;
    }
  }
  return best;
}

/**
 * Total order over calls of one source, independent of arrival order.
 */
export function compareCalls(a: FusionCall, b: FusionCall): number {
  return (
    compareText(a.file_name, b.file_name) ||
    compareText(a.specimen_id, b.specimen_id) ||
    compareText(formatBreakpoint(a.identity.breakpoint_a), formatBreakpoint(b.identity.breakpoint_a)) ||
    compareText(formatBreakpoint(a.identity.breakpoint_b), formatBreakpoint(b.identity.breakpoint_b)) ||
    support(b) - support(a) ||
    (b.evidence.ffpm ?? -1) - (a.evidence.ffpm ?? -1) ||
    (b.evidence.junction_reads ?? -1) - (a.evidence.junction_reads ?? -1) ||
    compareText(a.fusion_name, b.fusion_name) ||
    compareText(a.frame, b.frame) ||
    compareText(a.splice_type, b.splice_type) ||
    compareText(a.confidence, b.confidence) ||
    compareText(a.annotations.join(','), b.annotations.join(','))
  );
}

function compareText(a: string | null, b: string | null): number {
  const x = a ?? '';
  const y = b ?? '';
  return x < y ? -1 : x > y ? 1 : 0;
}

/**
 * Breakpoints of the best call from the highest-priority source that has any.
 */
function representativeIdentity(
  best_by_priority: Array<FusionCall | undefined>,
  fallback: FusionIdentity
): FusionIdentity {
  for (const call of best_by_priority) {
    if (call && hasBreakpoints(call.identity)) return call.identity;
  }
  return fallback;
}

function allConcordant(calls: readonly FusionCall[], tolerance: number): boolean {
  return (
    sideConcordant(calls.map((c) => c.identity.breakpoint_a), tolerance) &&
    sideConcordant(calls.map((c) => c.identity.breakpoint_b), tolerance)
  );
}

/**
 * Known breakpoints of one partner are pairwise compatible exactly when they
 * share chromosome and strand and span no more than the tolerance.
 */
function sideConcordant(breakpoints: Array<Breakpoint | null>, tolerance: number): boolean {
  const known = breakpoints.filter((bp): bp is Breakpoint => bp !== null);
  if (known.length < 2) return true;

  const chromosomes = new Set(known.map((bp) => bp.chromosome));
  const strands = new Set(known.map((bp) => bp.strand).filter((s) => s !== null));
  const positions = known.map((bp) => bp.position);

  return (
    chromosomes.size === 1 &&
    strands.size <= 1 &&
    Math.max(...positions) - Math.min(...positions) <= tolerance
  );
}
