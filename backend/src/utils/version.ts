import { VersionComparison } from '../types/Firmware';

export interface ParsedVersion {
  components: number[];
  suffix: string;
}

const VERSION_REGEX = /^(\d+(?:\.\d+)*)(.*)$/;
const BUILD_VARIANT_REGEX = /\([^)]*\)/g;

/**
 * Parses `12.4.0`, `v12.4.0-rc1` or `12.4.0(tasmota)` into numeric components
 * and a pre-release suffix. Parenthesised build variants and `+build`
 * metadata do not take part in ordering.
 */
export function parseVersion(raw: string): ParsedVersion | null {
  if (typeof raw !== 'string') return null;
  const cleaned = raw.replace(BUILD_VARIANT_REGEX, '').trim().replace(/^[vV]/, '');
  const match = VERSION_REGEX.exec(cleaned);
  if (!match) return null;

  const components = match[1].split('.').map(part => parseInt(part, 10));
  const suffix = match[2].split('+')[0].replace(/^[-._\s]+/, '').trim().toLowerCase();
  return { components, suffix };
}

function compareComponents(a: number[], b: number[]): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const diff = (a[i] ?? 0) - (b[i] ?? 0);
    if (diff !== 0) return Math.sign(diff);
  }
  return 0;
}

function compareSuffixes(a: string, b: string): number {
  if (a === b) return 0;
  // A release outranks any pre-release of the same numbers
  if (a === '') return 1;
  if (b === '') return -1;
  return Math.sign(a.localeCompare(b, 'en', { numeric: true }));
}

export function compareVersions(installed: string, latest: string): VersionComparison {
  const a = parseVersion(installed);
  const b = parseVersion(latest);
  if (!a || !b) return 'incomparable';

  const order = compareComponents(a.components, b.components) || compareSuffixes(a.suffix, b.suffix);
  if (order < 0) return 'older';
  if (order > 0) return 'newer';
  return 'same';
}

export function isMinimalBuild(version: string): boolean {
  return version.toLowerCase().includes('minimal');
}
