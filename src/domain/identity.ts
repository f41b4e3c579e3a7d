/**
 * Fusion identity normalization
 *
 * Gene pairs are compared order-independently: symbols are trimmed and
 * upper-cased, then stored in sorted order with each breakpoint kept beside its
 * gene. A breakpoint that is absent is unknown and compatible with any other.
 */

import { MalformedIdentityError } from './errors.js';
import type { Breakpoint, FusionIdentity, Strand } from './types.js';

const FUSION_NAME_SEPARATORS = /--|::/;
const MISSING_VALUES = new Set(['', '.', 'NA', 'N/A']);

export function normalizeGene(symbol: string): string {
  return symbol.trim().toUpperCase();
}

export function pairKey(gene_a: string, gene_b: string): string {
  return `${gene_a}--${gene_b}`;
}

export function normalize(
  geneA: string,
  geneB: string,
  breakpointA: Breakpoint | null = null,
  breakpointB: Breakpoint | null = null
): FusionIdentity {
  const a = normalizeGene(geneA);
  const b = normalizeGene(geneB);

  if (!a || !b) {
    throw new MalformedIdentityError(
      `Fusion partner gene symbol is empty (got "${geneA}" and "${geneB}")`
    );
  }

  const swap = b < a;
  const gene_a = swap ? b : a;
  const gene_b = swap ? a : b;

  return Object.freeze({
    gene_a,
    gene_b,
    breakpoint_a: freezeBreakpoint(swap ? breakpointB : breakpointA),
    breakpoint_b: freezeBreakpoint(swap ? breakpointA : breakpointB),
    key: pairKey(gene_a, gene_b),
  });
}

function freezeBreakpoint(bp: Breakpoint | null): Breakpoint | null {
  return bp ? Object.freeze({ ...bp }) : null;
}

/**
 * Normalize a fusion given by name (`A--B` or `A::B`).
 */
export function normalizeFusionName(
  name: string,
  breakpointA: Breakpoint | null = null,
  breakpointB: Breakpoint | null = null
): FusionIdentity {
  const [gene_a, gene_b] = splitFusionName(name);
  return normalize(gene_a, gene_b, breakpointA, breakpointB);
}

export function splitFusionName(name: string): [string, string] {
  const parts = name.trim().split(FUSION_NAME_SEPARATORS);
  if (parts.length !== 2) {
    throw new MalformedIdentityError(`Fusion name "${name}" does not name exactly two genes`);
  }
  return [parts[0], parts[1]];
}

/**
 * Parse `chr12:6555000:+` (strand optional). Missing markers give null.
 */
export function parseBreakpoint(text: string | undefined, strand?: string): Breakpoint | null {
  const value = (text ?? '').trim();
  if (MISSING_VALUES.has(value)) return null;

  const [chromosome, position_text, strand_text, ...rest] = value.split(':');
  const position = Number(position_text);

  if (!chromosome || rest.length > 0 || !/^\d+$/.test(position_text ?? '')) {
    throw new MalformedIdentityError(`Malformed breakpoint "${value}"`);
  }

  return {
    chromosome,
    position,
    strand: parseStrand(strand_text ?? strand),
  };
}

function parseStrand(text: string | undefined): Strand | null {
  const value = (text ?? '').trim();
  if (value === '+' || value === '-') return value;
  if (MISSING_VALUES.has(value)) return null;
  throw new MalformedIdentityError(`Malformed strand "${value}"`);
}

export function formatBreakpoint(bp: Breakpoint | null): string | null {
  if (!bp) return null;
  return bp.strand
    ? `${bp.chromosome}:${bp.position}:${bp.strand}`
    : `${bp.chromosome}:${bp.position}`;
}

export function breakpointsCompatible(
  a: Breakpoint | null,
  b: Breakpoint | null,
  tolerance: number
): boolean {
  if (!a || !b) return true;
  if (a.chromosome !== b.chromosome) return false;
  if (a.strand && b.strand && a.strand !== b.strand) return false;
  return Math.abs(a.position - b.position) <= tolerance;
}

/**
 * Same gene pair, and each partner's breakpoints within tolerance or unknown.
 */
export function identitiesMatch(a: FusionIdentity, b: FusionIdentity, tolerance = 0): boolean {
  return (
    a.key === b.key &&
    breakpointsCompatible(a.breakpoint_a, b.breakpoint_a, tolerance) &&
    breakpointsCompatible(a.breakpoint_b, b.breakpoint_b, tolerance)
  );
}

export function hasBreakpoints(identity: FusionIdentity): boolean {
  return identity.breakpoint_a !== null || identity.breakpoint_b !== null;
}
