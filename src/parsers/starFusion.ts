/**
 * STAR-Fusion `star-fusion.fusion_predictions.abridged.tsv` parser (primary caller)
 */

import { normalizeFusionName, parseBreakpoint } from '../domain/identity.js';
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
} from './table.js';
import { parseAnnotations } from './annotations.js';

const logger = createLogger('star-fusion');

export const STAR_FUSION_SOURCE = 'STAR-Fusion';

export const STAR_FUSION_REQUIRED_COLUMNS = [
  '#FusionName',
  'JunctionReadCount',
  'SpanningFragCount',
  'LeftBreakpoint',
  'RightBreakpoint',
  'FFPM',
];

export function parseStarFusionFile(file: SourceFile): ParseResult<FusionCall> {
  const table = readTable(file);
  requireColumns(table, STAR_FUSION_REQUIRED_COLUMNS, STAR_FUSION_SOURCE);
  const specimen_id = parseSpecimenId(file.name);

  const result = parseRows(table, STAR_FUSION_SOURCE, (row): FusionCall => {
    const fusion_name = row.values['#FusionName'].trim();
    const identity = normalizeFusionName(
      fusion_name,
      parseBreakpoint(row.values['LeftBreakpoint']),
      parseBreakpoint(row.values['RightBreakpoint'])
    );

    return {
      identity,
      source: 'star_fusion',
      file_name: file.name,
      specimen_id,
      fusion_name,
      evidence: {
        junction_reads: readRequiredNumber(row, 'JunctionReadCount'),
        spanning_frags: readRequiredNumber(row, 'SpanningFragCount'),
        ffpm: readRequiredNumber(row, 'FFPM'),
      },
      frame: readOptionalText(row, 'PROT_FUSION_TYPE'),
      splice_type: readOptionalText(row, 'SpliceType'),
      confidence: null,
      annotations: parseAnnotations(row.values['annots']),
    };
  });

  logger.info(
    { file: file.name, calls: result.records.length, skipped: result.skipped.length },
    'Parsed STAR-Fusion file'
  );
  return result;
}

export function parseStarFusion(files: readonly SourceFile[]): ParseResult<FusionCall> {
  return parseFiles(files, parseStarFusionFile);
}
