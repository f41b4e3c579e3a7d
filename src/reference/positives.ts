/**
 * Previously reported positives: a laboratory export of specimens with the
 * fusions reported for them, written as free text in the result column.
 */

import { normalize, pairKey } from '../domain/identity.js';
import type { FusionIdentity, PositivesIndex, PreviousPositive, SourceFile } from '../domain/types.js';
import { readTable, requireColumns } from '../parsers/table.js';
import { createLogger } from '../utils/log.js';

const logger = createLogger('positives');

export const POSITIVES_SOURCE = 'PreviousPositives';

export const POSITIVES_REQUIRED_COLUMNS = ['Specimen Identifier', 'Test Result'];

// GENE::GENE, GENE--GENE or GENE - GENE
const FUSION_PATTERN = /([A-Za-z0-9][\w.-]*?)\s*(?:::|--|\s-\s)\s*([A-Za-z0-9][\w.-]*)/g;
const TRANSCRIPT_PREFIX = /^(NM_|NR_|XM_|XR_|ENST|ENSG)/i;

/**
 * Pull gene pairs out of report text in the order written. Pairs naming a
 * transcript, or a token without letters, are dropped.
 */
export function extractGenePairs(text: string): Array<[string, string]> {
  const pairs: Array<[string, string]> = [];
  for (const match of text.matchAll(FUSION_PATTERN)) {
    const [, gene_a, gene_b] = match;
    if (!isGeneToken(gene_a) || !isGeneToken(gene_b)) continue;
    if (pairs.some(([a, b]) => a === gene_a && b === gene_b)) continue;
    pairs.push([gene_a, gene_b]);
  }
  return pairs;
}

export function extractFusions(text: string): string[] {
  return extractGenePairs(text).map(([a, b]) => pairKey(a, b));
}

function isGeneToken(token: string): boolean {
  return /[A-Za-z]/.test(token) && !TRANSCRIPT_PREFIX.test(token);
}

export function loadPositives(file: SourceFile): PositivesIndex {
  const table = readTable(file, ',');
  requireColumns(table, POSITIVES_REQUIRED_COLUMNS, POSITIVES_SOURCE);

  const grouped = new Map<string, { identity: FusionIdentity; specimens: Set<string> }>();

  for (const row of table.rows) {
    const specimen = row.values['Specimen Identifier'].trim();
    for (const [gene_a, gene_b] of extractGenePairs(row.values['Test Result'])) {
      const identity = normalize(gene_a, gene_b);
      const group = grouped.get(identity.key) ?? { identity, specimens: new Set<string>() };
      if (specimen) group.specimens.add(specimen);
      grouped.set(identity.key, group);
    }
  }

  const index = new Map<string, PreviousPositive>();
  for (const [key, group] of grouped) {
    index.set(key, { identity: group.identity, specimens: [...group.specimens].sort() });
  }

  logger.info({ file: file.name, fusions: index.size }, 'Loaded previously reported positives');
  return index;
}
