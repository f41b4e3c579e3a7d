/**
 * Main pipeline orchestrator
 */

import { SOURCE_LABELS, SOURCE_PRIORITY } from '../config/defaults.js';
import type { PipelineInputs, RunMetadata, SourceFile } from '../domain/types.js';
import { generateRunId, hashString } from '../utils/hash.js';
import { getOutputDir, readSourceFile } from '../utils/io.js';
import { createLogger } from '../utils/log.js';
import { exportWorkbook } from './export.js';
import { buildFusionReport, type FusionReport, type FusionReportInputs } from './report.js';

const logger = createLogger('pipeline');

export interface PipelineRunResult {
  run_id: string;
  workbook_path: string;
  success: boolean;
  error?: string;
}

async function readAll(paths: readonly string[]): Promise<SourceFile[]> {
  return Promise.all(paths.map((p) => readSourceFile(p)));
}

export async function loadReportInputs(inputs: PipelineInputs): Promise<FusionReportInputs> {
  const [star_fusion, fusion_inspector, arriba, fastqc, historical, reference, positives] =
    await Promise.all([
      readAll(inputs.starFusion),
      readAll(inputs.fusionInspector),
      readAll(inputs.arriba),
      readAll(inputs.fastqc),
      readSourceFile(inputs.historical),
      readSourceFile(inputs.reference),
      readSourceFile(inputs.positives),
    ]);

  return { star_fusion, fusion_inspector, arriba, fastqc, historical, reference, positives };
}

function contentHashes(files: FusionReportInputs): Record<string, string[]> {
  const hash = (list: SourceFile[]) => list.map((f) => hashString(f.content));
  return {
    star_fusion: hash(files.star_fusion),
    fusion_inspector: hash(files.fusion_inspector),
    arriba: hash(files.arriba),
    fastqc: hash(files.fastqc),
    historical: hash([files.historical]),
    reference: hash([files.reference]),
    positives: hash([files.positives]),
  };
}

export async function runPipeline(inputs: PipelineInputs): Promise<PipelineRunResult> {
  const start_time = Date.now();
  logger.info({ inputs }, 'Starting pipeline run');

  try {
    // Stage 0: Read input files
    logger.info('Stage 0: Reading input files');
    const files = await loadReportInputs(inputs);

    const report = buildFusionReport(files, {
      breakpoint_tolerance: inputs.breakpointTolerance,
    });

    const run_id = generateRunId(contentHashes(files), {
      breakpoint_tolerance: inputs.breakpointTolerance,
    });
    logger.info({ run_id }, 'Run ID generated');

    // Stage 5: Write workbook
    logger.info('Stage 5: Writing workbook');
    const metadata: Omit<RunMetadata, 'sheets'> = {
      run_id,
      created_at: new Date().toISOString(),
      project_name: inputs.projectName,
      input_files: {
        star_fusion: inputs.starFusion,
        fusion_inspector: inputs.fusionInspector,
        arriba: inputs.arriba,
        fastqc: inputs.fastqc,
        historical: [inputs.historical],
        reference: [inputs.reference],
        positives: [inputs.positives],
      },
      breakpoint_tolerance: inputs.breakpointTolerance,
      status: 'completed',
    };
    const { workbook_path } = await exportWorkbook(report, metadata, getOutputDir(inputs.outputDir));

    const duration_sec = ((Date.now() - start_time) / 1000).toFixed(1);
    logger.info({ run_id, duration_sec }, 'Pipeline run completed successfully');

    printSummary(run_id, report, workbook_path);

    return {
      run_id,
      workbook_path,
      success: true,
    };
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    const errorStack = error instanceof Error ? error.stack : undefined;
    logger.error({ error: errorMessage, stack: errorStack }, 'Pipeline run failed');

    return {
      run_id: 'failed',
      workbook_path: '',
      success: false,
      error: errorMessage,
    };
  }
}

function printSummary(run_id: string, report: FusionReport, workbook_path: string): void {
  console.log('\n' + '='.repeat(80));
  console.log('PIPELINE RUN SUMMARY');
  console.log('='.repeat(80));
  console.log(`Run ID: ${run_id}`);
  for (const source of SOURCE_PRIORITY) {
    console.log(`${SOURCE_LABELS[source]} calls: ${report.calls[source].length}`);
  }
  console.log(`QC samples: ${new Set(report.qc_metrics.map((m) => m.sample)).size}`);
  console.log(`Distinct fusions: ${report.records.length}`);
  console.log(`  Recurrent: ${report.summary.filter((r) => r.is_recurrent).length}`);
  console.log(`  Known: ${report.summary.filter((r) => r.is_known).length}`);
  console.log(`  Previously reported: ${report.summary.filter((r) => r.is_previously_reported).length}`);

  if (report.skipped.length > 0) {
    console.log();
    console.log(`⚠️  ${report.skipped.length} rows skipped while parsing (see Skipped_Rows sheet)`);
  }
  console.log();

  console.log(`Workbook saved to: ${workbook_path}`);
  console.log('='.repeat(80) + '\n');
}
