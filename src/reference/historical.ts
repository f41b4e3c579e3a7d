/**
 * Historical calls: how many times each fusion was predicted across prior runs
 */

import { HISTORICAL_SAMPLES_ROW } from '../config/defaults.js';
import { MalformedIdentityError } from '../domain/errors.js';
import { normalizeFusionName } from '../domain/identity.js';
import type { HistoricalIndex, HistoricalObservation, SourceFile } from '../domain/types.js';
import {
  pickColumn,
  readRequiredNumber,
  readTable,
  requireColumns,
  RowError,
} from '../parsers/table.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('historical');

export const HISTORICAL_SOURCE = 'SF_Previous_Runs';

/** Current name first; older files carry the run range in the header. */
export const HISTORICAL_COUNT_COLUMNS = ['Count_predicted', 'Count_Run_1_Run_20_predicted'];

export function loadHistorical(file: SourceFile): HistoricalIndex {
  const table = readTable(file);
  requireColumns(table, ['#FusionName'], HISTORICAL_SOURCE);
  const count_column = pickColumn(table, HISTORICAL_COUNT_COLUMNS, HISTORICAL_SOURCE);

  const observations = new Map<string, HistoricalObservation>();
  const seen = new Set<string>();
  let sample_count: number | null = null;
  let ignored = 0;

  for (const row of table.rows) {
    const name = row.values['#FusionName'].trim();
    const signature = `${name}\t${row.values[count_column].trim()}`;
    if (seen.has(signature)) continue;
    seen.add(signature);

    try {
      const count = readRequiredNumber(row, count_column);

      if (name === HISTORICAL_SAMPLES_ROW) {
        sample_count = count;
        continue;
      }

      const identity = normalizeFusionName(name);
      const previous = observations.get(identity.key);
      observations.set(identity.key, {
        identity: previous?.identity ?? identity,
        count: (previous?.count ?? 0) + count,
      });
    } catch (error) {
      if (!(error instanceof RowError || error instanceof MalformedIdentityError)) throw error;
      ignored++;
      logger.warn({ file: file.name, line: row.line, reason: error.message }, 'Ignored historical row');
    }
  }

  logger.info(
    { file: file.name, fusions: observations.size, sample_count, ignored },
    'Loaded historical calls'
  );
  return { observations, sample_count };
}
