/**
 * Report assembly: parse every source, load lookups, reconcile, summarize.
 *
 * Synchronous over files already read into memory. Schema and empty-file
 * failures propagate, so nothing downstream of a failed parser is produced.
 */

import type {
  FusionCall,
  FusionRecord,
  QCMetric,
  QCPivotRow,
  SkippedRow,
  SourceFile,
  SourceName,
  SummaryRow,
} from '../domain/types.js';
import { parseArriba } from '../parsers/arriba.js';
import { parseFastqc } from '../parsers/fastqc.js';
import { parseFusionInspector } from '../parsers/fusionInspector.js';
import { parseStarFusion } from '../parsers/starFusion.js';
import { loadHistorical } from '../reference/historical.js';
import { loadPositives } from '../reference/positives.js';
import { loadReference } from '../reference/referenceSources.js';
import { createLogger } from '../utils/log.js';
import { pivotQcBySpecimen } from './qcPivot.js';
import { DEFAULT_RECONCILE_OPTIONS, reconcile, type ReconcileOptions } from './reconcile.js';
import { summarize } from './summarize.js';

const logger = createLogger('report');

export interface FusionReportInputs {
  star_fusion: SourceFile[];
  fusion_inspector: SourceFile[];
  arriba: SourceFile[];
  fastqc: SourceFile[];
  historical: SourceFile;
  reference: SourceFile;
  positives: SourceFile;
}

export interface FusionReport {
  calls: Record<SourceName, FusionCall[]>;
  qc_metrics: QCMetric[];
  qc_pivot: QCPivotRow[];
  records: FusionRecord[];
  summary: SummaryRow[];
  skipped: SkippedRow[];
  historical_sample_count: number | null;
}

export function buildFusionReport(
  inputs: FusionReportInputs,
  options: ReconcileOptions = DEFAULT_RECONCILE_OPTIONS
): FusionReport {
  logger.info('Stage 1: Parsing source files');
  const star_fusion = parseStarFusion(inputs.star_fusion);
  const fusion_inspector = parseFusionInspector(inputs.fusion_inspector);
  const arriba = parseArriba(inputs.arriba);
  const fastqc = parseFastqc(inputs.fastqc);

  logger.info('Stage 2: Loading reference data');
  const reference = loadReference(inputs.reference);
  const historical = loadHistorical(inputs.historical);
  const positives = loadPositives(inputs.positives);

  logger.info('Stage 3: Reconciling calls');
  const calls: Record<SourceName, FusionCall[]> = {
    star_fusion: star_fusion.records,
    fusion_inspector: fusion_inspector.records,
    arriba: arriba.records,
  };
  const records = reconcile(calls, reference, historical, positives, options);

  logger.info('Stage 4: Building summary');
  const summary = summarize(records);

  const skipped = [
    ...star_fusion.skipped,
    ...fusion_inspector.skipped,
    ...arriba.skipped,
    ...fastqc.skipped,
  ];
  if (skipped.length > 0) {
    logger.warn({ skipped: skipped.length }, 'Rows skipped while parsing');
  }

  return {
    calls,
    qc_metrics: fastqc.records,
    qc_pivot: pivotQcBySpecimen(fastqc.records),
    records,
    summary,
    skipped,
    historical_sample_count: historical.sample_count,
  };
}
