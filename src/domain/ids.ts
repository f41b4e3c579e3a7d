/**
 * Utilities for deriving specimen and file identifiers from sample names
 */

/**
 * Sample names follow `<episode>-<specimen>-<run>-<panel>_S<n>_L<lane>_R<read>`.
 * Returns the specimen field, or null when the name has no second field.
 */
export function parseSpecimenId(sample: string): string | null {
  const parts = baseName(sample).split('-');
  const specimen = parts[1]?.trim();
  return specimen ? specimen : null;
}

/**
 * First three `-` fields of a sample name, as IGV sessions label them.
 */
export function parseIgvSpecimenName(sample: string): string {
  return baseName(sample).split('-').slice(0, 3).join('-');
}

/**
 * Project names carry a numeric prefix (`002_25PCAN4_run`); the workbook is
 * named after the remainder.
 */
export function deriveProjectName(raw: string): string {
  const parts = raw.trim().split('_');
  if (parts.length > 1 && /^\d+$/.test(parts[0])) {
    return parts.slice(1).join('_');
  }
  return raw.trim();
}

function baseName(path: string): string {
  const segments = path.split(/[\\/]/);
  return segments[segments.length - 1];
}
