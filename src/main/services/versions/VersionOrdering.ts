import type { VersionTag } from '@shared/contracts';

const SEGMENT_COUNT = 3;
const SEGMENT_WIDTH = 3;
const SEGMENT_MAX = 999;
const ZERO_KEY = '0'.repeat(SEGMENT_COUNT * SEGMENT_WIDTH);

/**
 * Converts a version string into a fixed-width key of three zero-padded
 * segments, so that plain string comparison orders versions numerically
 * ("2.0" -> "002000000" sorts before "11.0" -> "011000000").
 *
 * Non-digit characters are stripped from each dot-separated segment, missing
 * segments count as 0, anything past the third segment is ignored and values
 * above 999 are clamped. Never throws.
 */
export function normalizeVersion(version: string | null | undefined): string {
  if (typeof version !== 'string' || !version.trim()) {
    return ZERO_KEY;
  }

  const parts = version.split('.');
  let key = '';
  for (let i = 0; i < SEGMENT_COUNT; i += 1) {
    key += String(parseSegment(parts[i])).padStart(SEGMENT_WIDTH, '0');
  }

  return key;
}

export function toVersionTag(version: string | null | undefined): VersionTag {
  return {
    raw: version ?? '',
    key: normalizeVersion(version)
  };
}

export function compareVersions(left: string | null | undefined, right: string | null | undefined): -1 | 0 | 1 {
  const a = normalizeVersion(left);
  const b = normalizeVersion(right);
  if (a === b) {
    return 0;
  }

  return a < b ? -1 : 1;
}

export const versionComparator = (left: string, right: string): number => compareVersions(left, right);

export function isNewerThan(candidate: string | null | undefined, target: string | null | undefined): boolean {
  return compareVersions(candidate, target) > 0;
}

export function isOlderThan(candidate: string | null | undefined, target: string | null | undefined): boolean {
  return compareVersions(candidate, target) < 0;
}

export function isAtLeast(candidate: string | null | undefined, target: string | null | undefined): boolean {
  return compareVersions(candidate, target) >= 0;
}

export function isAtMost(candidate: string | null | undefined, target: string | null | undefined): boolean {
  return compareVersions(candidate, target) <= 0;
}

export function isExactly(candidate: string | null | undefined, target: string | null | undefined): boolean {
  return compareVersions(candidate, target) === 0;
}

export function majorVersionOf(version: string | null | undefined): number {
  return Number(normalizeVersion(version).slice(0, SEGMENT_WIDTH));
}

// Normalization drops the qualifier, so snapshot detection works on the raw text.
export function isSnapshotVersion(version: string | null | undefined): boolean {
  return typeof version === 'string' && /snapshot/i.test(version);
}

function parseSegment(segment: string | undefined): number {
  if (segment === undefined) {
    return 0;
  }

  const digits = segment.replace(/[^0-9]/g, '');
  if (!digits) {
    return 0;
  }

  const value = Number(digits);
  if (!Number.isFinite(value)) {
    return SEGMENT_MAX;
  }

  return Math.min(value, SEGMENT_MAX);
}
