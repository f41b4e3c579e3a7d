/**
 * Unit tests for the source parsers
 *
 * Tests verify:
 * - Column mapping into FusionCall / QCMetric
 * - Row-level problems become skipped rows
 * - Missing columns and empty files fail the whole file
 */

import { describe, it, expect } from 'vitest';
import { EmptyResultError, SchemaError } from '../../domain/errors.js';
import type { SourceFile } from '../../domain/types.js';
import { arribaGene, parseArriba, parseArribaFile } from '../arriba.js';
import { parseFastqcFile } from '../fastqc.js';
import { parseFusionInspectorFile } from '../fusionInspector.js';
import { parseAnnotations } from '../annotations.js';
import { parseStarFusion, parseStarFusionFile } from '../starFusion.js';
import { readTable, splitRecords } from '../table.js';

// ============================================================================
// Test Fixtures
// ============================================================================

function tsvFile(name: string, rows: string[][]): SourceFile {
  return { name, content: rows.map((r) => r.join('\t')).join('\n') + '\n' };
}

const SF_HEADER = [
  '#FusionName',
  'JunctionReadCount',
  'SpanningFragCount',
  'SpliceType',
  'LeftBreakpoint',
  'RightBreakpoint',
  'FFPM',
  'PROT_FUSION_TYPE',
  'annots',
];

const SF_FILE = '12345678-SP001A-RUN1-P1_S1.star-fusion.fusion_predictions.abridged.tsv';

function starFusionFile(rows: string[][], header: string[] = SF_HEADER): SourceFile {
  return tsvFile(SF_FILE, [header, ...rows]);
}

const EML4_ALK = [
  'EML4--ALK', '12', '4', 'ONLY_REF_SPLICE',
  'chr2:42522656:+', 'chr2:29446394:-', '1.25', 'INFRAME', '["Mitelman","chimerdb_pubmed"]',
];
const TMPRSS2_ERG = [
  'TMPRSS2--ERG', '8', '2', 'ONLY_REF_SPLICE',
  'chr21:41508081:-', 'chr21:38584945:-', '0.8', 'FRAMESHIFT', '[]',
];
const GENE3_GENE4 = ['GENE3--GENE4', '3', '0', 'INCL_NON_REF_SPLICE', 'chr7:100:+', 'chr7:900:+', '0.1', '.', '.'];

// ============================================================================
// Table reading
// ============================================================================

describe('readTable', () => {
  it('keeps 1-based line numbers and skips blank lines', () => {
    const table = readTable({ name: 't.tsv', content: 'a\tb\r\n1\t2\n\n3\t4\n' });
    expect(table.columns).toEqual(['a', 'b']);
    expect(table.rows).toEqual([
      { line: 2, values: { a: '1', b: '2' } },
      { line: 4, values: { a: '3', b: '4' } },
    ]);
  });

  it('fills absent trailing fields with empty text', () => {
    const table = readTable({ name: 't.tsv', content: 'a\tb\tc\n1\n' });
    expect(table.rows[0].values).toEqual({ a: '1', b: '', c: '' });
  });

  it('splits quoted fields containing the delimiter', () => {
    expect(splitRecords('S1,"EML4-ALK, ""confirmed""",x', ',')).toEqual([
      { line: 1, fields: ['S1', 'EML4-ALK, "confirmed"', 'x'] },
    ]);
    expect(splitRecords('a,,b,', ',')).toEqual([{ line: 1, fields: ['a', '', 'b', ''] }]);
  });

  it('keeps line breaks inside quoted fields', () => {
    const table = readTable(
      { name: 't.csv', content: 'id,text\r\nS1,"first\r\nsecond"\r\nS2,plain\r\n' },
      ','
    );
    expect(table.rows).toEqual([
      { line: 2, values: { id: 'S1', text: 'first\nsecond' } },
      { line: 4, values: { id: 'S2', text: 'plain' } },
    ]);
  });
});

describe('parseAnnotations', () => {
  it('reads list-like annotation text', () => {
    expect(parseAnnotations('["Mitelman","CCLE_StarF2019"]')).toEqual(['Mitelman', 'CCLE_StarF2019']);
    expect(parseAnnotations('[]')).toEqual([]);
    expect(parseAnnotations(undefined)).toEqual([]);
  });
});

// ============================================================================
// STAR-Fusion
// ============================================================================

describe('parseStarFusionFile', () => {
  it('maps columns into a normalized call', () => {
    const { records, skipped } = parseStarFusionFile(starFusionFile([EML4_ALK]));

    expect(skipped).toEqual([]);
    expect(records).toHaveLength(1);
    const call = records[0];
    expect(call.identity.key).toBe('ALK--EML4');
    expect(call.identity.breakpoint_a).toEqual({ chromosome: 'chr2', position: 29446394, strand: '-' });
    expect(call.identity.breakpoint_b).toEqual({ chromosome: 'chr2', position: 42522656, strand: '+' });
    expect(call.source).toBe('star_fusion');
    expect(call.file_name).toBe(SF_FILE);
    expect(call.specimen_id).toBe('SP001A');
    expect(call.fusion_name).toBe('EML4--ALK');
    expect(call.evidence).toEqual({ junction_reads: 12, spanning_frags: 4, ffpm: 1.25 });
    expect(call.frame).toBe('INFRAME');
    expect(call.splice_type).toBe('ONLY_REF_SPLICE');
    expect(call.confidence).toBeNull();
    expect(call.annotations).toEqual(['Mitelman', 'chimerdb_pubmed']);
  });

  it('skips malformed rows and keeps the rest', () => {
    const bad_name = ['BAD', '5', '1', 'ONLY_REF_SPLICE', 'chr1:1:+', 'chr1:2:+', '0.5', '.', '.'];
    const bad_count = ['GENE1--GENE2', 'abc', '1', 'ONLY_REF_SPLICE', 'chr1:1:+', 'chr5:2:+', '0.5', '.', '.'];

    const { records, skipped } = parseStarFusionFile(
      starFusionFile([EML4_ALK, TMPRSS2_ERG, bad_name, bad_count, GENE3_GENE4])
    );

    expect(records.map((r) => r.fusion_name)).toEqual(['EML4--ALK', 'TMPRSS2--ERG', 'GENE3--GENE4']);
    expect(skipped).toEqual([
      {
        source: 'STAR-Fusion',
        file_name: SF_FILE,
        row_number: 4,
        reason: 'Fusion name "BAD" does not name exactly two genes',
      },
      {
        source: 'STAR-Fusion',
        file_name: SF_FILE,
        row_number: 5,
        reason: 'JunctionReadCount is not numeric: "abc"',
      },
    ]);
  });

  it('treats missing optional text as null', () => {
    const { records } = parseStarFusionFile(starFusionFile([GENE3_GENE4]));
    expect(records[0].frame).toBeNull();
    expect(records[0].annotations).toEqual([]);
  });

  it('fails the file when a required column is missing', () => {
    const header = SF_HEADER.filter((c) => c !== 'FFPM');
    const file = starFusionFile([], header);

    expect(() => parseStarFusionFile(file)).toThrow(SchemaError);
    expect(() => parseStarFusionFile(file)).toThrow(
      `Required column "FFPM" missing from STAR-Fusion file ${SF_FILE}`
    );
  });

  it('fails when the file yields no records', () => {
    expect(() => parseStarFusionFile(starFusionFile([]))).toThrow(EmptyResultError);

    const only_bad = starFusionFile([['X', '1', '1', '.', '.', '.', '1', '.', '.']]);
    expect(() => parseStarFusionFile(only_bad)).toThrow(
      `STAR-Fusion file ${SF_FILE} yielded no usable records (1 rows skipped)`
    );
  });

  it('concatenates several files in order', () => {
    const second: SourceFile = { ...starFusionFile([TMPRSS2_ERG]), name: '87654321-SP002B-RUN1.tsv' };
    const { records } = parseStarFusion([starFusionFile([EML4_ALK]), second]);
    expect(records.map((r) => r.specimen_id)).toEqual(['SP001A', 'SP002B']);
  });
});

// ============================================================================
// FusionInspector
// ============================================================================

describe('parseFusionInspectorFile', () => {
  const header = ['#FusionName', 'JunctionReadCount', 'SpanningFragCount', 'LeftBreakpoint', 'RightBreakpoint'];
  const name = '12345678-SP001A-RUN1.FusionInspector.fusions.abridged.tsv';

  it('drops repeated rows and leaves FFPM unknown when absent', () => {
    const row = ['EML4--ALK', '10', '3', 'chr2:42522656:+', 'chr2:29446394:-'];
    const { records } = parseFusionInspectorFile(
      tsvFile(name, [header, row, row, ['TMPRSS2--ERG', '4', '1', 'chr21:41508081:-', 'chr21:38584945:-']])
    );

    expect(records).toHaveLength(2);
    expect(records[0].source).toBe('fusion_inspector');
    expect(records[0].evidence).toEqual({ junction_reads: 10, spanning_frags: 3, ffpm: null });
  });

  it('requires the junction count column', () => {
    const file = tsvFile(name, [header.filter((c) => c !== 'JunctionReadCount')]);
    expect(() => parseFusionInspectorFile(file)).toThrow(SchemaError);
  });
});

// ============================================================================
// Arriba
// ============================================================================

describe('parseArribaFile', () => {
  const header = [
    '#gene1', 'gene2', 'strand1(gene/fusion)', 'strand2(gene/fusion)', 'breakpoint1', 'breakpoint2',
    'type', 'split_reads1', 'split_reads2', 'discordant_mates', 'confidence', 'reading_frame',
  ];
  const name = '12345678-SP001A-RUN1.arriba.fusions.tsv';

  it('sums split reads and reads strands from the fusion column', () => {
    const { records } = parseArribaFile(
      tsvFile(name, [
        header,
        ['BCR', 'ABL1', '+/+', '+/+', 'chr22:23290413', 'chr9:130854064', 'translocation', '10', '5', '7', 'high', 'in-frame'],
      ])
    );

    const call = records[0];
    expect(call.identity.key).toBe('ABL1--BCR');
    expect(call.identity.breakpoint_a).toEqual({ chromosome: 'chr9', position: 130854064, strand: '+' });
    expect(call.fusion_name).toBe('BCR--ABL1');
    expect(call.evidence).toEqual({ junction_reads: 15, spanning_frags: 7, ffpm: null });
    expect(call.confidence).toBe('high');
    expect(call.frame).toBe('in-frame');
    expect(call.annotations).toEqual(['translocation']);
  });

  it('uses the nearest gene of an intergenic partner', () => {
    expect(arribaGene('LINC01234(1500),GENE5(3000)')).toBe('LINC01234');
    expect(arribaGene('ALK')).toBe('ALK');
  });

  it('fails when no Arriba file has a usable row', () => {
    expect(() => parseArriba([tsvFile(name, [header])])).toThrow(EmptyResultError);
  });
});

// ============================================================================
// FastQC
// ============================================================================

describe('parseFastqcFile', () => {
  const sample = '12345678-SP001A-RUN1-P1_S1_L001_R1';

  it('derives unique and duplicate read counts', () => {
    const { records } = parseFastqcFile(
      tsvFile('multiqc_fastqc.txt', [
        ['Sample', 'Total Sequences', 'total_deduplicated_percentage', 'basic_statistics', 'adapter_content'],
        [sample, '2000000', '75', 'pass', 'warn'],
      ])
    );

    expect(records.map((m) => [m.name, m.value])).toEqual([
      ['total_sequences', 2000000],
      ['deduplicated_percentage', 75],
      ['unique_reads', 1500000],
      ['duplicate_reads', 500000],
      ['unique_reads_m', 1.5],
      ['duplicate_reads_m', 0.5],
      ['basic_statistics', 'pass'],
      ['adapter_content', 'warn'],
    ]);
    expect(records.every((m) => m.sample === sample && m.specimen_id === 'SP001A')).toBe(true);
  });

  it('fails when the Sample column is missing', () => {
    const file = tsvFile('multiqc_fastqc.txt', [
      ['Total Sequences', 'total_deduplicated_percentage'],
      ['2000000', '75'],
    ]);
    expect(() => parseFastqcFile(file)).toThrow('Required column "Sample" missing from FastQC file multiqc_fastqc.txt');
  });
});
