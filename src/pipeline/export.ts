/**
 * Workbook export: one worksheet per sheet in a single spreadsheet, plus a JSON
 * copy of the run metadata and summary beside it
 */

import ExcelJS from 'exceljs';
import type { Workbook, Worksheet } from 'exceljs';
import { join } from 'path';
import {
  HYPERLINK_FONT_COLOR,
  SHEET_NAMES,
  SOURCE_LABELS,
  SUMMARY_DROP_DOWNS,
  SUMMARY_TAB_COLOR,
  VARSOME_POSITION_URL,
  WORKBOOK_SUFFIX,
  type DropDownConfig,
} from '../config/defaults.js';
import { formatBreakpoint, normalizeGene, splitFusionName } from '../domain/identity.js';
import { parseIgvSpecimenName } from '../domain/ids.js';
import type {
  FusionCall,
  QCMetric,
  RunMetadata,
  SourceName,
  SummaryRow,
} from '../domain/types.js';
import { ensureDir, readJson, writeJson } from '../utils/io.js';
import { createLogger } from '../utils/log.js';
import type { FusionReport } from './report.js';

const logger = createLogger('export');

export interface WorkbookFile {
  metadata: RunMetadata;
  summary: SummaryRow[];
  qc_pivot: FusionReport['qc_pivot'];
  skipped: FusionReport['skipped'];
  historical_sample_count: number | null;
}

export type SheetValue = string | number | boolean | null;
export type SheetRow = Record<string, SheetValue>;

export interface Sheet {
  name: string;
  headers: string[];
  rows: SheetRow[];
  /** Columns holding breakpoints, rendered as VarSome links */
  hyperlinks?: readonly string[];
  /** Columns rendered as list validations */
  drop_downs?: Record<string, DropDownConfig>;
  /** ARGB */
  tab_color?: string;
}

/**
 * VarSome position link for a `chr:pos[:strand]` breakpoint. Text that is not
 * a breakpoint is passed through as the position.
 */
export function generateVarsomeUrl(breakpoint: string): string {
  const position = breakpoint.split(':').slice(0, 2).join(':');
  return VARSOME_POSITION_URL + encodeURIComponent(position);
}

export function workbookFileName(project_name: string): string {
  return `${project_name}_${WORKBOOK_SUFFIX}.xlsx`;
}

/** The JSON written beside a workbook. */
export function reportFileFor(workbook_path: string): string {
  return workbook_path.replace(/\.xlsx$/, '') + '.json';
}

const SUMMARY_HEADERS = [
  '#FusionName',
  'LeftBreakpoint',
  'RightBreakpoint',
  'JunctionReadCount',
  'SpanningFragCount',
  'FFPM',
  'FRAME',
  'Count_predicted',
  'ReferenceSources',
  'PreviousPositives',
  'Specimens',
  'Sources',
  'Recurrent',
  'Known',
  'PreviouslyReported',
  'BreakpointsConcordant',
  'Reported',
  'Oncogenicity',
];

function yesNo(value: boolean): string {
  return value ? 'Yes' : 'No';
}

export function summarySheet(rows: readonly SummaryRow[]): Sheet {
  return {
    name: SHEET_NAMES.SUMMARY,
    headers: SUMMARY_HEADERS,
    hyperlinks: ['LeftBreakpoint', 'RightBreakpoint'],
    drop_downs: SUMMARY_DROP_DOWNS,
    tab_color: SUMMARY_TAB_COLOR,
    rows: rows.map((row) => ({
      '#FusionName': row.fusion_name,
      LeftBreakpoint: row.breakpoint_a,
      RightBreakpoint: row.breakpoint_b,
      JunctionReadCount: row.junction_reads,
      SpanningFragCount: row.spanning_frags,
      FFPM: row.ffpm,
      FRAME: row.frame,
      Count_predicted: row.historical_count,
      ReferenceSources: row.reference_sources.join(','),
      PreviousPositives: row.previous_positive_specimens.join(','),
      Specimens: row.specimens.join(','),
      Sources: row.sources.map((s) => SOURCE_LABELS[s]).join(','),
      Recurrent: yesNo(row.is_recurrent),
      Known: yesNo(row.is_known),
      PreviouslyReported: yesNo(row.is_previously_reported),
      BreakpointsConcordant: yesNo(row.breakpoints_concordant),
      // Filled in by the reviewer
      Reported: null,
      Oncogenicity: null,
    })),
  };
}

const CALL_HEADERS = [
  'file_name',
  'SPECIMEN',
  '#FusionName',
  'LeftBreakpoint',
  'RightBreakpoint',
  'JunctionReadCount',
  'SpanningFragCount',
  'FFPM',
  'FRAME',
  'SpliceType',
  'Confidence',
  'Annotations',
];

/**
 * Breakpoints in the orientation the tool reported (5' partner first).
 */
export function reportedBreakpoints(call: FusionCall): [string | null, string | null] {
  const [five_prime] = splitFusionName(call.fusion_name);
  const { identity } = call;
  const left_is_a = normalizeGene(five_prime) === identity.gene_a;
  const left = left_is_a ? identity.breakpoint_a : identity.breakpoint_b;
  const right = left_is_a ? identity.breakpoint_b : identity.breakpoint_a;
  return [formatBreakpoint(left), formatBreakpoint(right)];
}

export function callSheet(name: string, calls: readonly FusionCall[]): Sheet {
  return {
    name,
    headers: CALL_HEADERS,
    hyperlinks: ['LeftBreakpoint', 'RightBreakpoint'],
    rows: calls.map((call) => {
      const [left, right] = reportedBreakpoints(call);
      return {
        file_name: call.file_name,
        SPECIMEN: call.specimen_id,
        '#FusionName': call.fusion_name,
        LeftBreakpoint: left,
        RightBreakpoint: right,
        JunctionReadCount: call.evidence.junction_reads,
        SpanningFragCount: call.evidence.spanning_frags,
        FFPM: call.evidence.ffpm,
        FRAME: call.frame,
        SpliceType: call.splice_type,
        Confidence: call.confidence,
        Annotations: call.annotations.join(','),
      };
    }),
  };
}

/**
 * One row per sample, one column per metric, in first-seen order.
 */
export function qcSheet(metrics: readonly QCMetric[]): Sheet {
  const headers = ['Sample', 'SPECIMEN', 'IGV_SPECIMEN'];
  const rows = new Map<string, SheetRow>();

  for (const metric of metrics) {
    if (!headers.includes(metric.name)) headers.push(metric.name);
    const row = rows.get(metric.sample) ?? {
      Sample: metric.sample,
      SPECIMEN: metric.specimen_id,
      IGV_SPECIMEN: parseIgvSpecimenName(metric.sample),
    };
    row[metric.name] = metric.value;
    rows.set(metric.sample, row);
  }

  return { name: SHEET_NAMES.FASTQC, headers, rows: [...rows.values()] };
}

export function buildSheets(report: FusionReport): Sheet[] {
  const source_sheets: Record<SourceName, string> = {
    star_fusion: SHEET_NAMES.STAR_FUSION,
    fusion_inspector: SHEET_NAMES.FUSION_INSPECTOR,
    arriba: SHEET_NAMES.ARRIBA,
  };

  return [
    summarySheet(report.summary),
    callSheet(source_sheets.star_fusion, report.calls.star_fusion),
    callSheet(source_sheets.fusion_inspector, report.calls.fusion_inspector),
    callSheet(source_sheets.arriba, report.calls.arriba),
    qcSheet(report.qc_metrics),
    {
      name: SHEET_NAMES.FASTQC_PIVOT,
      headers: ['SPECIMEN', 'Unique Reads(M)', 'Duplicate Reads(M)'],
      rows: report.qc_pivot.map((row) => ({
        SPECIMEN: row.specimen_id,
        'Unique Reads(M)': row.unique_reads_m,
        'Duplicate Reads(M)': row.duplicate_reads_m,
      })),
    },
    {
      name: SHEET_NAMES.SKIPPED_ROWS,
      headers: ['source', 'file_name', 'row_number', 'reason'],
      rows: report.skipped.map((s) => ({
        source: s.source,
        file_name: s.file_name,
        row_number: s.row_number,
        reason: s.reason,
      })),
    },
  ];
}

function columnWidth(header: string, sheet: Sheet): number {
  const options = sheet.drop_downs?.[header]?.options ?? [];
  return Math.max(10, ...[header, ...options].map((text) => text.length + 2));
}

function renderSheet(workbook: Workbook, sheet: Sheet): Worksheet {
  const worksheet = workbook.addWorksheet(
    sheet.name,
    sheet.tab_color ? { properties: { tabColor: { argb: sheet.tab_color } } } : {}
  );
  worksheet.columns = sheet.headers.map((header) => ({
    header,
    key: header,
    width: columnWidth(header, sheet),
  }));
  worksheet.views = [{ state: 'frozen', ySplit: 1 }];

  for (const row of sheet.rows) {
    const added = worksheet.addRow(sheet.headers.map((header) => row[header] ?? null));

    for (const column of sheet.hyperlinks ?? []) {
      const text = row[column];
      if (typeof text !== 'string' || text === '') continue;
      const cell = added.getCell(column);
      cell.value = { text, hyperlink: generateVarsomeUrl(text) };
      cell.font = { color: { argb: HYPERLINK_FONT_COLOR } };
    }

    for (const [column, config] of Object.entries(sheet.drop_downs ?? {})) {
      added.getCell(column).dataValidation = {
        type: 'list',
        allowBlank: true,
        formulae: [`"${config.options.join(',')}"`],
        showInputMessage: true,
        promptTitle: config.title,
        prompt: config.prompt,
        showErrorMessage: true,
      };
    }
  }

  return worksheet;
}

export function buildWorkbook(sheets: readonly Sheet[]): Workbook {
  const workbook = new ExcelJS.Workbook();
  for (const sheet of sheets) {
    renderSheet(workbook, sheet);
  }
  return workbook;
}

export async function exportWorkbook(
  report: FusionReport,
  metadata: Omit<RunMetadata, 'sheets'>,
  output_dir: string
): Promise<{ workbook_path: string; metadata: RunMetadata }> {
  await ensureDir(output_dir);
  const workbook_path = join(output_dir, workbookFileName(metadata.project_name));

  const sheets = buildSheets(report);
  await buildWorkbook(sheets).xlsx.writeFile(workbook_path);

  const full_metadata: RunMetadata = { ...metadata, sheets: sheets.map((s) => s.name) };
  const workbook: WorkbookFile = {
    metadata: full_metadata,
    summary: report.summary,
    qc_pivot: report.qc_pivot,
    skipped: report.skipped,
    historical_sample_count: report.historical_sample_count,
  };
  await writeJson(reportFileFor(workbook_path), workbook);

  logger.info({ workbook_path, sheets: full_metadata.sheets }, 'Workbook written');
  return { workbook_path, metadata: full_metadata };
}

export async function printReport(workbook_path: string): Promise<void> {
  logger.info({ workbook_path }, 'Generating report');
  const workbook = await readJson<WorkbookFile>(reportFileFor(workbook_path));
  const { metadata, summary } = workbook;

  console.log('\n' + '='.repeat(80));
  console.log('FUSION WORKBOOK REPORT');
  console.log('='.repeat(80));
  console.log(`Run ID: ${metadata.run_id}`);
  console.log(`Project: ${metadata.project_name}`);
  console.log(`Created: ${metadata.created_at}`);
  console.log(`Breakpoint tolerance: ${metadata.breakpoint_tolerance} bp`);
  console.log(`Sheets: ${metadata.sheets.join(', ')}`);
  console.log();

  console.log('FUSIONS:');
  console.log(`  Total: ${summary.length}`);
  console.log(`  Recurrent: ${summary.filter((r) => r.is_recurrent).length}`);
  console.log(`  Known: ${summary.filter((r) => r.is_known).length}`);
  console.log(`  Previously reported: ${summary.filter((r) => r.is_previously_reported).length}`);
  console.log(`  Discordant breakpoints: ${summary.filter((r) => !r.breakpoints_concordant).length}`);
  console.log();

  const top = [...summary]
    .sort((a, b) => (b.junction_reads ?? 0) - (a.junction_reads ?? 0))
    .slice(0, 10);

  console.log('TOP 10 FUSIONS BY JUNCTION READS:');
  for (const row of top) {
    const flags = [
      row.is_recurrent ? 'recurrent' : null,
      row.is_known ? 'known' : null,
      row.is_previously_reported ? 'previously reported' : null,
    ].filter((f) => f !== null);
    console.log(`  ${row.fusion_name}: ${row.junction_reads ?? '-'} junction reads`);
    console.log(`    ${row.sources.map((s) => SOURCE_LABELS[s]).join(', ')}${flags.length ? ` [${flags.join(', ')}]` : ''}`);
  }
  console.log();

  if (workbook.skipped.length > 0) {
    console.log(`SKIPPED ROWS: ${workbook.skipped.length}`);
    for (const skipped of workbook.skipped.slice(0, 10)) {
      console.log(`  ${skipped.file_name}:${skipped.row_number} ${skipped.reason}`);
    }
    console.log();
  }

  console.log('='.repeat(80) + '\n');
}
