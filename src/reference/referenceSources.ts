/**
 * Curated fusion databases (`ReferenceSources.tsv`): one row per fusion with a
 * comma-separated list of the databases that document it.
 */

import { MalformedIdentityError } from '../domain/errors.js';
import { normalizeFusionName } from '../domain/identity.js';
import type { ReferenceEntry, ReferenceIndex, SourceFile } from '../domain/types.js';
import { readOptionalText, readTable, requireColumns } from '../parsers/table.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('reference-sources');

export const REFERENCE_SOURCE = 'ReferenceSources';

export function loadReference(file: SourceFile): ReferenceIndex {
  const table = readTable(file);
  requireColumns(table, ['Fusion', 'ReferenceSources'], REFERENCE_SOURCE);

  const index = new Map<string, ReferenceEntry[]>();
  let malformed = 0;

  for (const row of table.rows) {
    try {
      const identity = normalizeFusionName(row.values['Fusion']);
      const annotation = readOptionalText(row, 'Annotation');
      const entries = index.get(identity.key) ?? [];

      for (const provenance of splitSources(row.values['ReferenceSources'])) {
        if (entries.some((e) => e.provenance === provenance)) continue;
        entries.push({ identity, provenance, annotation });
      }
      if (entries.length > 0) index.set(identity.key, entries);
    } catch (error) {
      if (!(error instanceof MalformedIdentityError)) throw error;
      malformed++;
      logger.warn({ file: file.name, line: row.line, reason: error.message }, 'Ignored reference row');
    }
  }

  for (const entries of index.values()) {
    entries.sort((a, b) => (a.provenance < b.provenance ? -1 : a.provenance > b.provenance ? 1 : 0));
  }

  logger.info({ file: file.name, fusions: index.size, malformed }, 'Loaded reference sources');
  return index;
}

function splitSources(raw: string | undefined): string[] {
  return (raw ?? '')
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
