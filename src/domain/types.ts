/**
 * Core domain types for the fusion aggregation pipeline
 */

/** Primary caller, validation tool and secondary caller, in that order. */
export type SourceName = 'star_fusion' | 'fusion_inspector' | 'arriba';

export type Strand = '+' | '-';

export interface Breakpoint {
  readonly chromosome: string;
  readonly position: number;
  readonly strand: Strand | null;
}

/**
 * Order-independent fusion key. `gene_a` sorts before `gene_b`; each breakpoint
 * belongs to the gene on the same side.
 */
export interface FusionIdentity {
  readonly gene_a: string;
  readonly gene_b: string;
  readonly breakpoint_a: Breakpoint | null;
  readonly breakpoint_b: Breakpoint | null;
  /** `GENE_A--GENE_B` */
  readonly key: string;
}

/** A file already read into memory. */
export interface SourceFile {
  name: string;
  content: string;
}

export interface FusionEvidence {
  readonly junction_reads: number | null;
  readonly spanning_frags: number | null;
  readonly ffpm: number | null;
}

export interface FusionCall {
  readonly identity: FusionIdentity;
  readonly source: SourceName;
  readonly file_name: string;
  readonly specimen_id: string | null;
  /** Fusion name as the tool reported it */
  readonly fusion_name: string;
  readonly evidence: FusionEvidence;
  readonly frame: string | null;
  readonly splice_type: string | null;
  readonly confidence: string | null;
  readonly annotations: readonly string[];
}

export interface QCMetric {
  readonly sample: string;
  readonly specimen_id: string | null;
  readonly name: string;
  readonly value: number | string;
}

export interface SkippedRow {
  readonly source: string;
  readonly file_name: string;
  /** 1-based line number in the file, header included */
  readonly row_number: number;
  readonly reason: string;
}

export interface ParseResult<T> {
  records: T[];
  skipped: SkippedRow[];
}

export interface ReferenceEntry {
  readonly identity: FusionIdentity;
  /** Curated database the entry came from, e.g. COSMIC */
  readonly provenance: string;
  readonly annotation: string | null;
}

export type ReferenceIndex = ReadonlyMap<string, readonly ReferenceEntry[]>;

export interface HistoricalObservation {
  readonly identity: FusionIdentity;
  readonly count: number;
}

export interface HistoricalIndex {
  readonly observations: ReadonlyMap<string, HistoricalObservation>;
  /** Number of samples the counts were taken from, when the file records it */
  readonly sample_count: number | null;
}

export interface PreviousPositive {
  readonly identity: FusionIdentity;
  readonly specimens: readonly string[];
}

export type PositivesIndex = ReadonlyMap<string, PreviousPositive>;

export type CallsBySource = Partial<Record<SourceName, readonly FusionCall[]>>;

export interface FusionRecord {
  readonly identity: FusionIdentity;
  readonly fusion_name: string;
  /** Every contributing call, per source */
  readonly calls: Readonly<Partial<Record<SourceName, readonly FusionCall[]>>>;
  readonly best_calls: Readonly<Partial<Record<SourceName, FusionCall>>>;
  /** Reporting sources in priority order */
  readonly sources: readonly SourceName[];
  readonly historical_count: number;
  readonly reference_hits: readonly ReferenceEntry[];
  readonly is_previous_positive: boolean;
  readonly previous_positive_specimens: readonly string[];
  /** False when two calls name the same genes with breakpoints beyond tolerance */
  readonly breakpoints_concordant: boolean;
}

export type SummaryField =
  | 'breakpoints'
  | 'junction_reads'
  | 'spanning_frags'
  | 'ffpm'
  | 'frame';

export interface SummaryRow {
  readonly fusion_name: string;
  readonly gene_a: string;
  readonly gene_b: string;
  readonly breakpoint_a: string | null;
  readonly breakpoint_b: string | null;
  readonly junction_reads: number | null;
  readonly spanning_frags: number | null;
  readonly ffpm: number | null;
  readonly frame: string | null;
  /** Source that supplied each selected field, null when no source had a value */
  readonly field_sources: Readonly<Record<SummaryField, SourceName | null>>;
  readonly sources: readonly SourceName[];
  readonly specimens: readonly string[];
  readonly historical_count: number;
  readonly reference_sources: readonly string[];
  readonly previous_positive_specimens: readonly string[];
  readonly is_recurrent: boolean;
  readonly is_known: boolean;
  readonly is_previously_reported: boolean;
  readonly breakpoints_concordant: boolean;
}

export interface QCPivotRow {
  specimen_id: string;
  unique_reads_m: number;
  duplicate_reads_m: number;
}

export interface PipelineInputs {
  starFusion: string[];
  fusionInspector: string[];
  arriba: string[];
  fastqc: string[];
  historical: string;
  reference: string;
  positives: string;
  projectName: string;
  outputDir: string;
  breakpointTolerance: number;
}

export interface RunMetadata {
  run_id: string;
  created_at: string;
  project_name: string;
  input_files: Record<string, string[]>;
  breakpoint_tolerance: number;
  sheets: string[];
  status: 'completed' | 'failed';
  error?: string;
}
