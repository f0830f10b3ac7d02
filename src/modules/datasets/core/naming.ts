const DATASET_NAME_RE = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;
const TAG_NAME_RE = /^[A-Za-z0-9][A-Za-z0-9._+-]*$/;

export const isValidDatasetName = (name: string): boolean =>
  DATASET_NAME_RE.test(name) && !name.includes('..') && !name.endsWith('.');

/**
 * Tag names end up in refs and file names, so they follow the same rules
 * as git ref components.
 */
export const isValidTagName = (name: string): boolean =>
  TAG_NAME_RE.test(name) && !name.includes('..') && !name.endsWith('.lock');

/**
 * Turns free text (a title) into a dataset name: whitespace becomes '-',
 * everything is lowercased and characters outside the name alphabet dropped.
 */
export const slugify = (value: string): string =>
  value
    .trim()
    .replace(/\s+/g, '-')
    .toLowerCase()
    .replace(/[^a-z0-9._-]/g, '')
    .replace(/-{2,}/g, '-')
    .replace(/\.{2,}/g, '.')
    .replace(/^[^a-z0-9]+/, '')
    .replace(/[.-]+$/, '');

/**
 * Tag name for a provider version label, or null when none can be derived.
 */
export const toTagName = (version: string): string | null => {
  const trimmed = version.trim();
  if (isValidTagName(trimmed)) {
    return trimmed;
  }
  const slug = slugify(trimmed);
  return slug !== '' && isValidTagName(slug) ? slug : null;
};
