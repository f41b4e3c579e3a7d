/**
 * FastQC pivot: read totals per specimen, with a grand total row
 */

import type { QCMetric, QCPivotRow } from '../domain/types.js';

export const QC_TOTAL_LABEL = 'Total';

function round(value: number): number {
  return Math.round(value * 1_000_000) / 1_000_000;
}

function pivotField(name: string): 'unique_reads_m' | 'duplicate_reads_m' | null {
  if (name === 'unique_reads_m' || name === 'duplicate_reads_m') return name;
  return null;
}

export function pivotQcBySpecimen(metrics: readonly QCMetric[]): QCPivotRow[] {
  const by_specimen = new Map<string, QCPivotRow>();

  for (const metric of metrics) {
    const field = pivotField(metric.name);
    if (!field || typeof metric.value !== 'number') continue;

    const specimen_id = metric.specimen_id ?? metric.sample;
    const row = by_specimen.get(specimen_id) ?? {
      specimen_id,
      unique_reads_m: 0,
      duplicate_reads_m: 0,
    };
    row[field] += metric.value;
    by_specimen.set(specimen_id, row);
  }

  const rows = [...by_specimen.values()]
    .map((row) => ({
      ...row,
      unique_reads_m: round(row.unique_reads_m),
      duplicate_reads_m: round(row.duplicate_reads_m),
    }))
    .sort((a, b) => (a.specimen_id < b.specimen_id ? -1 : a.specimen_id > b.specimen_id ? 1 : 0));

  rows.push({
    specimen_id: QC_TOTAL_LABEL,
    unique_reads_m: round(rows.reduce((sum, r) => sum + r.unique_reads_m, 0)),
    duplicate_reads_m: round(rows.reduce((sum, r) => sum + r.duplicate_reads_m, 0)),
  });

  return rows;
}
