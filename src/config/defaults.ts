/**
 * Default configuration values
 */

import type { SourceName } from '../domain/types.js';

/** Summary field precedence: the first source here with a value wins. */
export const SOURCE_PRIORITY: readonly SourceName[] = ['star_fusion', 'fusion_inspector', 'arriba'];

export const SOURCE_LABELS: Record<SourceName, string> = {
  star_fusion: 'STAR-Fusion',
  fusion_inspector: 'FusionInspector',
  arriba: 'Arriba',
};

export const PIPELINE_DEFAULTS = {
  BREAKPOINT_TOLERANCE: 0,
  OUTPUT_DIR: 'out',
  PROJECT_NAME: 'fusion_run',
};

export const WORKBOOK_SUFFIX = 'fusion_workbook';

export const SHEET_NAMES = {
  SUMMARY: 'Summary',
  STAR_FUSION: 'STAR-Fusion',
  FUSION_INSPECTOR: 'Fusion_Inspector',
  ARRIBA: 'Arriba',
  FASTQC: 'FastQC',
  FASTQC_PIVOT: 'FastQC_Pivot',
  SKIPPED_ROWS: 'Skipped_Rows',
} as const;

export const VARSOME_POSITION_URL = 'https://varsome.com/position/hg38/';

export const SUMMARY_TAB_COLOR = 'FF9400D3';
export const HYPERLINK_FONT_COLOR = 'FF00007F';

export interface DropDownConfig {
  options: readonly string[];
  prompt: string;
  title: string;
}

/** Reviewer-filled Summary columns rendered as list validations */
export const SUMMARY_DROP_DOWNS: Record<string, DropDownConfig> = {
  Reported: {
    options: ['Yes', 'No'],
    prompt: 'Choose Yes or No',
    title: 'Fusion reported or not?',
  },
  Oncogenicity: {
    options: ['Pathogenic', 'Likely Pathogenic', 'VUS', 'Likely Benign', 'Benign'],
    prompt: 'Select from the list',
    title: 'Oncogenicity',
  },
};

/** Row in the historical calls file carrying the number of samples counted */
export const HISTORICAL_SAMPLES_ROW = '#Samples';

/** FastQC module status columns reported as categorical QC metrics when present */
export const FASTQC_STATUS_COLUMNS = [
  'basic_statistics',
  'per_base_sequence_quality',
  'adapter_content',
  'overrepresented_sequences',
];
