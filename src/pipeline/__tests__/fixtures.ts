/**
 * Builders shared by the pipeline tests
 */

import { normalize, normalizeFusionName, parseBreakpoint, splitFusionName } from '../../domain/identity.js';
import type {
  FusionCall,
  HistoricalIndex,
  HistoricalObservation,
  PositivesIndex,
  PreviousPositive,
  ReferenceEntry,
  ReferenceIndex,
  SourceName,
} from '../../domain/types.js';
import type { FusionReportInputs } from '../report.js';

export interface CallOptions {
  source?: SourceName;
  left?: string;
  right?: string;
  junction?: number | null;
  spanning?: number | null;
  ffpm?: number | null;
  frame?: string | null;
  specimen?: string | null;
  file?: string;
}

function or<T>(value: T | undefined, fallback: T): T {
  return value === undefined ? fallback : value;
}

/** Breakpoints are given in the orientation of `fusion_name`. */
export function makeCall(fusion_name: string, options: CallOptions = {}): FusionCall {
  const [five_prime, three_prime] = splitFusionName(fusion_name);
  const source = options.source ?? 'star_fusion';

  return {
    identity: normalize(five_prime, three_prime, parseBreakpoint(options.left), parseBreakpoint(options.right)),
    source,
    file_name: options.file ?? `${source}.tsv`,
    specimen_id: or(options.specimen, 'SP001'),
    fusion_name,
    evidence: {
      junction_reads: or(options.junction, 10),
      spanning_frags: or(options.spanning, 2),
      ffpm: or(options.ffpm, source === 'arriba' ? null : 1),
    },
    frame: or(options.frame, null),
    splice_type: null,
    confidence: null,
    annotations: [],
  };
}

export function history(counts: Array<[string, number]>, sample_count: number | null = null): HistoricalIndex {
  const observations = new Map<string, HistoricalObservation>();
  for (const [name, count] of counts) {
    const identity = normalizeFusionName(name);
    observations.set(identity.key, { identity, count });
  }
  return { observations, sample_count };
}

export function references(rows: Array<[string, string[]]>): ReferenceIndex {
  const index = new Map<string, ReferenceEntry[]>();
  for (const [name, provenances] of rows) {
    const identity = normalizeFusionName(name);
    index.set(
      identity.key,
      provenances.map((provenance) => ({ identity, provenance, annotation: null }))
    );
  }
  return index;
}

export function positives(rows: Array<[string, string[]]>): PositivesIndex {
  const index = new Map<string, PreviousPositive>();
  for (const [name, specimens] of rows) {
    const identity = normalizeFusionName(name);
    index.set(identity.key, { identity, specimens });
  }
  return index;
}

export const NO_REFERENCE = references([]);
export const NO_HISTORY = history([]);
export const NO_POSITIVES = positives([]);

function tsv(rows: string[][]): string {
  return rows.map((r) => r.join('\t')).join('\n') + '\n';
}

/**
 * One small run: GENE1--GENE2 seen by both STAR-Fusion and FusionInspector,
 * EML4--ALK by STAR-Fusion and Arriba, GENE5--GENE6 by Arriba alone.
 */
export function sampleReportInputs(): FusionReportInputs {
  return {
    star_fusion: [
      {
        name: '12345678-SP001A-RUN1.star-fusion.tsv',
        content: tsv([
          ['#FusionName', 'JunctionReadCount', 'SpanningFragCount', 'LeftBreakpoint', 'RightBreakpoint', 'FFPM'],
          ['GENE1--GENE2', '12', '3', 'chr1:1000:+', 'chr5:2000:-', '0.5'],
          ['EML4--ALK', '20', '6', 'chr2:42522656:+', 'chr2:29446394:-', '2.1'],
        ]),
      },
    ],
    fusion_inspector: [
      {
        name: '12345678-SP001A-RUN1.FusionInspector.tsv',
        content: tsv([
          ['#FusionName', 'JunctionReadCount', 'SpanningFragCount', 'LeftBreakpoint', 'RightBreakpoint'],
          ['GENE1--GENE2', '10', '2', 'chr1:1000:+', 'chr5:2000:-'],
        ]),
      },
    ],
    arriba: [
      {
        name: '12345678-SP001A-RUN1.arriba.tsv',
        content: tsv([
          ['#gene1', 'gene2', 'breakpoint1', 'breakpoint2', 'split_reads1', 'split_reads2', 'discordant_mates'],
          ['GENE5', 'GENE6', 'chr3:100', 'chr4:200', '4', '3', '1'],
          ['ALK', 'EML4', 'chr2:29446394', 'chr2:42522656', '9', '9', '4'],
        ]),
      },
    ],
    fastqc: [
      {
        name: 'multiqc_fastqc.txt',
        content: tsv([
          ['Sample', 'Total Sequences', 'total_deduplicated_percentage'],
          ['12345678-SP001A-RUN1_R1', '1000000', '80'],
        ]),
      },
    ],
    historical: {
      name: 'SF_Previous_Runs.tsv',
      content: tsv([
        ['#FusionName', 'Count_predicted'],
        ['GENE2--GENE1', '3'],
        ['#Samples', '20'],
      ]),
    },
    reference: {
      name: 'ReferenceSources.tsv',
      content: tsv([
        ['Fusion', 'ReferenceSources'],
        ['EML4--ALK', 'COSMIC,ChimerKB4'],
      ]),
    },
    positives: {
      name: 'previous_positives.csv',
      content: 'Specimen Identifier,Test Result\nSP050,EML4::ALK\n',
    },
  };
}
