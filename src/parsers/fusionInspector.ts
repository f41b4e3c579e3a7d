/**
 * FusionInspector `*.FusionInspector.fusions.abridged.tsv` parser (validation tool)
 */

import { normalizeFusionName, parseBreakpoint } from '../domain/identity.js';
import { parseSpecimenId } from '../domain/ids.js';
import type { FusionCall, ParseResult, SourceFile } from '../domain/types.js';
import { createLogger } from '../utils/log.js';
import { parseAnnotations } from './annotations.js';
import {
  parseFiles,
  parseRows,
  readOptionalNumber,
  readOptionalText,
  readRequiredNumber,
  readTable,
  requireColumns,
  type Table,
} from './table.js';

const logger = createLogger('fusion-inspector');

export const FUSION_INSPECTOR_SOURCE = 'FusionInspector';

export const FUSION_INSPECTOR_REQUIRED_COLUMNS = [
  '#FusionName',
  'JunctionReadCount',
  'SpanningFragCount',
  'LeftBreakpoint',
  'RightBreakpoint',
];

/**
 * Merged inspector output repeats rows verbatim; keep the first of each.
 */
function dropDuplicateRows(table: Table): Table {
  const seen = new Set<string>();
  const rows = table.rows.filter((row) => {
    const signature = table.columns.map((c) => row.values[c]).join('\t');
    if (seen.has(signature)) return false;
    seen.add(signature);
    return true;
  });
  return { ...table, rows };
}

export function parseFusionInspectorFile(file: SourceFile): ParseResult<FusionCall> {
  const raw = readTable(file);
  requireColumns(raw, FUSION_INSPECTOR_REQUIRED_COLUMNS, FUSION_INSPECTOR_SOURCE);
  const table = dropDuplicateRows(raw);
  const specimen_id = parseSpecimenId(file.name);

  const result = parseRows(table, FUSION_INSPECTOR_SOURCE, (row): FusionCall => {
    const fusion_name = row.values['#FusionName'].trim();

    return {
      identity: normalizeFusionName(
        fusion_name,
        parseBreakpoint(row.values['LeftBreakpoint']),
        parseBreakpoint(row.values['RightBreakpoint'])
      ),
      source: 'fusion_inspector',
      file_name: file.name,
      specimen_id,
      fusion_name,
      evidence: {
        junction_reads: readRequiredNumber(row, 'JunctionReadCount'),
        spanning_frags: readRequiredNumber(row, 'SpanningFragCount'),
        ffpm: readOptionalNumber(row, 'FFPM'),
      },
      frame: readOptionalText(row, 'PROT_FUSION_TYPE'),
      splice_type: readOptionalText(row, 'SpliceType'),
      confidence: null,
      annotations: parseAnnotations(row.values['annots']),
    };
  });

  logger.info(
    {
      file: file.name,
      calls: result.records.length,
      duplicates_dropped: raw.rows.length - table.rows.length,
      skipped: result.skipped.length,
    },
    'Parsed FusionInspector file'
  );
  return result;
}

export function parseFusionInspector(files: readonly SourceFile[]): ParseResult<FusionCall> {
  return parseFiles(files, parseFusionInspectorFile);
}
