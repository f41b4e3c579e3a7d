/**
 * MultiQC `multiqc_fastqc.txt` parser: run-level read metrics per sample
 */

import { FASTQC_STATUS_COLUMNS } from '../config/defaults.js';
import { parseSpecimenId } from '../domain/ids.js';
import type { ParseResult, QCMetric, SourceFile } from '../domain/types.js';
import { createLogger } from '../utils/log.js';
import {
  parseFiles,
  parseRows,
  readOptionalText,
  readRequiredNumber,
  readTable,
  requireColumns,
  RowError,
} from './table.js';

const logger = createLogger('fastqc');

export const FASTQC_SOURCE = 'FastQC';

export const FASTQC_REQUIRED_COLUMNS = ['Sample', 'Total Sequences', 'total_deduplicated_percentage'];

export function parseFastqcFile(file: SourceFile): ParseResult<QCMetric> {
  const table = readTable(file);
  requireColumns(table, FASTQC_REQUIRED_COLUMNS, FASTQC_SOURCE);
  const status_columns = FASTQC_STATUS_COLUMNS.filter((c) => table.columns.includes(c));

  const per_sample = parseRows(table, FASTQC_SOURCE, (row): QCMetric[] => {
    const sample = row.values['Sample'].trim();
    if (!sample) {
      throw new RowError('Sample is empty');
    }
    const specimen_id = parseSpecimenId(sample);
    const total_sequences = readRequiredNumber(row, 'Total Sequences');
    const deduplicated_percentage = readRequiredNumber(row, 'total_deduplicated_percentage');

    const unique_reads = Math.trunc((deduplicated_percentage / 100) * total_sequences);
    const duplicate_reads = Math.trunc(total_sequences - unique_reads);

    const metric = (name: string, value: number | string): QCMetric => ({
      sample,
      specimen_id,
      name,
      value,
    });

    const metrics = [
      metric('total_sequences', total_sequences),
      metric('deduplicated_percentage', deduplicated_percentage),
      metric('unique_reads', unique_reads),
      metric('duplicate_reads', duplicate_reads),
      metric('unique_reads_m', unique_reads / 1_000_000),
      metric('duplicate_reads_m', duplicate_reads / 1_000_000),
    ];

    for (const column of status_columns) {
      const status = readOptionalText(row, column);
      if (status) metrics.push(metric(column, status));
    }

    return metrics;
  });

  const records = per_sample.records.flat();
  logger.info(
    { file: file.name, samples: per_sample.records.length, metrics: records.length },
    'Parsed FastQC metrics'
  );
  return { records, skipped: per_sample.skipped };
}

export function parseFastqc(files: readonly SourceFile[]): ParseResult<QCMetric> {
  return parseFiles(files, parseFastqcFile);
}
