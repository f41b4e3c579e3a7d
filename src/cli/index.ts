#!/usr/bin/env node

/**
 * CLI entry point for the fusion workbook pipeline
 */

// Load .env before any module reads the environment
import 'dotenv/config';
import { Command } from 'commander';
import { z } from 'zod';
import { loadSettings, resolveTolerance } from '../config/settings.js';
import { PIPELINE_DEFAULTS } from '../config/defaults.js';
import { deriveProjectName } from '../domain/ids.js';
import type { PipelineInputs } from '../domain/types.js';
import { printReport } from '../pipeline/export.js';
import { runPipeline } from '../pipeline/run.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('cli');
const program = new Command();

const RunOptionsSchema = z.object({
  starFusion: z.array(z.string()).min(1),
  fusionInspector: z.array(z.string()).min(1),
  arriba: z.array(z.string()).min(1),
  fastqc: z.array(z.string()).min(1),
  historical: z.string(),
  reference: z.string(),
  positives: z.string(),
  project: z.string().optional(),
  output: z.string().optional(),
  tolerance: z.string().optional(),
});

const ReportOptionsSchema = z.object({
  workbook: z.string(),
});

program
  .name('fusion-workbook')
  .description('Aggregate gene-fusion calls from several tools into one annotated workbook')
  .version('1.0.0');

// Run command
program
  .command('run')
  .description('Parse, reconcile and summarize fusion calls for one sequencing run')
  .requiredOption('--star-fusion <files...>', 'STAR-Fusion abridged prediction files')
  .requiredOption('--fusion-inspector <files...>', 'FusionInspector abridged files')
  .requiredOption('--arriba <files...>', 'Arriba fusions.tsv files')
  .requiredOption('--fastqc <files...>', 'MultiQC multiqc_fastqc.txt files')
  .requiredOption('--historical <file>', 'Historical STAR-Fusion call counts (TSV)')
  .requiredOption('--reference <file>', 'Curated reference sources (TSV)')
  .requiredOption('--positives <file>', 'Previously reported positives (CSV)')
  .option('--project <name>', 'Project name used to name the workbook')
  .option('--output <dir>', 'Output directory')
  .option('--tolerance <bases>', 'Breakpoint coordinate tolerance in bases')
  .action(async (raw: unknown) => {
    try {
      logger.info('Starting pipeline run command');

      const options = RunOptionsSchema.parse(raw);
      const settings = loadSettings();
      const project =
        options.project ?? settings.FUSION_PROJECT_NAME ?? PIPELINE_DEFAULTS.PROJECT_NAME;

      const inputs: PipelineInputs = {
        starFusion: options.starFusion,
        fusionInspector: options.fusionInspector,
        arriba: options.arriba,
        fastqc: options.fastqc,
        historical: options.historical,
        reference: options.reference,
        positives: options.positives,
        projectName: deriveProjectName(project),
        outputDir: options.output ?? settings.FUSION_OUTPUT_DIR,
        breakpointTolerance: resolveTolerance(options.tolerance, settings),
      };

      const result = await runPipeline(inputs);

      if (result.success) {
        console.log(`\n✓ Pipeline completed successfully!`);
        console.log(`  Run ID: ${result.run_id}`);
        console.log(`  Output: ${result.workbook_path}\n`);
        process.exit(0);
      } else {
        console.error(`\n✗ Pipeline failed: ${result.error}\n`);
        process.exit(1);
      }
    } catch (error) {
      logger.error({ error }, 'Pipeline run command failed');
      console.error(`\n✗ Unexpected error: ${error}\n`);
      process.exit(1);
    }
  });

// Report command
program
  .command('report')
  .description('Print a summary of a written workbook')
  .requiredOption('--workbook <file>', 'Workbook (.xlsx) written by the run command')
  .action(async (raw: unknown) => {
    try {
      const options = ReportOptionsSchema.parse(raw);
      await printReport(options.workbook);
    } catch (error) {
      logger.error({ error }, 'Report command failed');
      console.error(`\n✗ Failed to generate report: ${error}\n`);
      process.exit(1);
    }
  });

// Parse command line arguments
await program.parseAsync();
