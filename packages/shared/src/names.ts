import { UsageError } from './errors';

/** Prefix of stub-only packages on the index. */
export const STUB_PACKAGE_PREFIX = 'types-';

/**
 * Normalizes a package name the way the index compares names:
 * lower-cased, with every run of `-`, `_` and `.` collapsed to a single `-`.
 *
 * Normalizing an already normalized name returns it unchanged.
 */
export function normalizePackageName(name: string): string {
  const trimmed = name.trim();
  if (!trimmed) {
    throw new UsageError('Package name must not be empty');
  }
  return trimmed.toLowerCase().replace(/[-_.]+/g, '-');
}

/**
 * Conventional importable module name for a package:
 * `typing-extensions` → `typing_extensions`.
 */
export function toModuleName(name: string): string {
  return normalizePackageName(name).replace(/-/g, '_');
}

export function stubPackageName(name: string): string {
  return `${STUB_PACKAGE_PREFIX}${normalizePackageName(name)}`;
}
