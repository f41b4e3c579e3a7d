/**
 * `annots` columns hold a JSON-like list: `["Mitelman","CCLE_StarF2019"]`.
 */
export function parseAnnotations(raw: string | undefined): string[] {
  const value = (raw ?? '').trim();
  if (value === '' || value === '.' || value === '[]') return [];

  return value
    .replace(/^\[|\]$/g, '')
    .split(',')
    .map((item) => item.trim().replace(/^"|"$/g, '').trim())
    .filter((item) => item.length > 0);
}
