/**
 * Glob matching for source patterns and include/exclude filters.
 */

import { posix } from 'node:path';

import { minimatch } from 'minimatch';

import { creatorsIntersect } from './creators.js';

import type { DatasetFile } from './types.js';

const GLOB_RE = /[*?[]/;

export const hasGlob = (pattern: string): boolean => GLOB_RE.test(pattern);

/**
 * Strips `./`, leading and trailing slashes.
 */
export const normalizeSourcePath = (value: string): string =>
  value
    .replace(/\\/g, '/')
    .replace(/^(\.\/)+/, '')
    .replace(/^\/+/, '')
    .replace(/\/+$/, '');

/**
 * A source pattern selects: everything (empty), paths matching a glob,
 * an exact file, or every file below a directory.
 */
export const matchesSourcePattern = (path: string, pattern: string | null): boolean => {
  if (pattern === null) {
    return true;
  }

  const normalized = normalizeSourcePath(pattern);
  if (normalized === '' || normalized === '.') {
    return true;
  }
  if (hasGlob(normalized)) {
    return minimatch(path, normalized, { dot: true });
  }
  return path === normalized || path.startsWith(`${normalized}/`);
};

const literalPrefix = (pattern: string): string => {
  const segments = pattern.split('/');
  const firstGlob = segments.findIndex((segment) => hasGlob(segment));
  return segments.slice(0, firstGlob).join('/');
};

/**
 * Relative structure a matched path keeps below the destination:
 * exact file → basename, directory → `<dir>/<rest>`,
 * glob → path relative to the pattern's literal prefix.
 */
export const relativeTargetFor = (path: string, pattern: string | null): string => {
  const normalized = pattern === null ? '' : normalizeSourcePath(pattern);
  if (normalized === '' || normalized === '.') {
    return path;
  }

  if (hasGlob(normalized)) {
    const prefix = literalPrefix(normalized);
    return prefix === '' ? path : path.slice(prefix.length + 1);
  }

  if (path === normalized) {
    return posix.basename(path);
  }

  return `${posix.basename(normalized)}/${path.slice(normalized.length + 1)}`;
};

/**
 * Include/exclude globs. Patterns without a slash also match the basename.
 */
export const matchesGlob = (path: string, pattern: string): boolean =>
  minimatch(path, pattern, { dot: true, matchBase: !pattern.includes('/') });

export interface FileFilter {
  include?: readonly string[] | undefined;
  exclude?: readonly string[] | undefined;
  creators?: readonly string[] | undefined;
}

export const matchesFileFilter = (file: DatasetFile, filter: FileFilter): boolean => {
  const include = filter.include ?? [];
  const exclude = filter.exclude ?? [];
  const candidates = [file.path, file.fullPath];

  const included =
    include.length === 0 ||
    include.some((pattern) => candidates.some((candidate) => matchesGlob(candidate, pattern)));
  if (!included) {
    return false;
  }

  const excluded = exclude.some((pattern) =>
    candidates.some((candidate) => matchesGlob(candidate, pattern))
  );
  if (excluded) {
    return false;
  }

  return creatorsIntersect(file.creators, filter.creators ?? []);
};

export const hasPathFilters = (filter: FileFilter): boolean =>
  (filter.include ?? []).length > 0 || (filter.exclude ?? []).length > 0;
