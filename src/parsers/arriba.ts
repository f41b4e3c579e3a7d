/**
 * Arriba `fusions.tsv` parser (secondary caller)
 */

import { normalize, parseBreakpoint } from '../domain/identity.js';
import { parseSpecimenId } from '../domain/ids.js';
import type { FusionCall, ParseResult, SourceFile } from '../domain/types.js';
import { createLogger } from '../utils/log.js';
import {
  parseFiles,
  parseRows,
  readOptionalText,
  readRequiredNumber,
  readTable,
  requireColumns,
  type TableRow,
} from './table.js';

const logger = createLogger('arriba');

export const ARRIBA_SOURCE = 'Arriba';

export const ARRIBA_REQUIRED_COLUMNS = [
  '#gene1',
  'gene2',
  'breakpoint1',
  'breakpoint2',
  'split_reads1',
  'split_reads2',
  'discordant_mates',
];

/**
 * Intergenic partners are listed as `GENE1(1234),GENE2(5678)` with distances;
 * the nearest (first) gene is used.
 */
export function arribaGene(raw: string): string {
  return raw.split(',')[0].replace(/\(.*\)$/, '').trim();
}

/** `strand1(gene/fusion)` holds `+/-`; the fusion strand is the second half. */
function fusionStrand(row: TableRow, column: string): string | undefined {
  const value = row.values[column];
  if (value === undefined) return undefined;
  const parts = value.split('/');
  return parts[parts.length - 1];
}

export function parseArribaFile(file: SourceFile): ParseResult<FusionCall> {
  const table = readTable(file);
  requireColumns(table, ARRIBA_REQUIRED_COLUMNS, ARRIBA_SOURCE);
  const specimen_id = parseSpecimenId(file.name);

  const result = parseRows(table, ARRIBA_SOURCE, (row): FusionCall => {
    const gene1 = arribaGene(row.values['#gene1']);
    const gene2 = arribaGene(row.values['gene2']);
    const split_reads =
      readRequiredNumber(row, 'split_reads1') + readRequiredNumber(row, 'split_reads2');
    const type = readOptionalText(row, 'type');

    return {
      identity: normalize(
        gene1,
        gene2,
        parseBreakpoint(row.values['breakpoint1'], fusionStrand(row, 'strand1(gene/fusion)')),
        parseBreakpoint(row.values['breakpoint2'], fusionStrand(row, 'strand2(gene/fusion)'))
      ),
      source: 'arriba',
      file_name: file.name,
      specimen_id,
      fusion_name: `${gene1}--${gene2}`,
      evidence: {
        junction_reads: split_reads,
        spanning_frags: readRequiredNumber(row, 'discordant_mates'),
        ffpm: null,
      },
      frame: readOptionalText(row, 'reading_frame'),
      splice_type: null,
      confidence: readOptionalText(row, 'confidence'),
      annotations: type ? [type] : [],
    };
  });

  logger.info(
    { file: file.name, calls: result.records.length, skipped: result.skipped.length },
    'Parsed Arriba file'
  );
  return result;
}

export function parseArriba(files: readonly SourceFile[]): ParseResult<FusionCall> {
  return parseFiles(files, parseArribaFile);
}
