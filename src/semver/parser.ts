/**
 * Version parsing and precedence.
 *
 * Accepts `major.minor.patch[-prerelease][+build]`. Build metadata is
 * accepted and discarded; it never takes part in precedence.
 */

import { CompatError, versionParseError } from '../domain/errors';
import { Version } from '../domain/version';

export enum Ordering {
  Less = -1,
  Equal = 0,
  Greater = 1,
}

const VERSION_PATTERN =
  /^(\d+)\.(\d+)\.(\d+)(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?$/;

const NUMERIC_IDENTIFIER = /^\d+$/;

/** Parse version text. Throws CompatError (VERSION.PARSE) when malformed. */
export function parseVersion(text: string): Version {
  const input = text.trim();
  const match = VERSION_PATTERN.exec(input);
  if (!match) {
    throw new CompatError(versionParseError(text, 'expected major.minor.patch[-prerelease]'));
  }

  const [, majorText, minorText, patchText, prerelease] = match;
  const major = parseNumericPart(text, 'major', majorText);
  const minor = parseNumericPart(text, 'minor', minorText);
  const patch = parseNumericPart(text, 'patch', patchText);

  if (prerelease !== undefined) {
    for (const identifier of prerelease.split('.')) {
      if (NUMERIC_IDENTIFIER.test(identifier) && identifier.length > 1 && identifier.startsWith('0')) {
        throw new CompatError(
          versionParseError(text, `numeric prerelease identifier "${identifier}" has a leading zero`),
        );
      }
    }
  }

  return createVersion(major, minor, patch, prerelease);
}

/** Parse without throwing; returns null for malformed text. */
export function tryParseVersion(text: string): Version | null {
  try {
    return parseVersion(text);
  } catch (err) {
    if (err instanceof CompatError) return null;
    throw err;
  }
}

/** Build a frozen Version from already-validated fields. */
export function createVersion(major: number, minor: number, patch: number, prerelease?: string): Version {
  const version: Version =
    prerelease === undefined ? { major, minor, patch } : { major, minor, patch, prerelease };
  return Object.freeze(version);
}

export function formatVersion(version: Version): string {
  const core = `${version.major}.${version.minor}.${version.patch}`;
  return version.prerelease ? `${core}-${version.prerelease}` : core;
}

/** Semantic-version precedence of `a` relative to `b`. */
export function compareVersions(a: Version, b: Version): Ordering {
  return (
    compareNumbers(a.major, b.major) ||
    compareNumbers(a.minor, b.minor) ||
    compareNumbers(a.patch, b.patch) ||
    comparePrerelease(a.prerelease, b.prerelease)
  );
}

export function versionsEqual(a: Version, b: Version): boolean {
  return compareVersions(a, b) === Ordering.Equal;
}

/** Copy of `items` sorted by version, highest precedence first. */
export function sortDescending<T extends { version: Version }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => compareVersions(b.version, a.version));
}

function parseNumericPart(text: string, field: string, digits: string): number {
  if (digits.length > 1 && digits.startsWith('0')) {
    throw new CompatError(versionParseError(text, `${field} has a leading zero`));
  }
  const value = Number(digits);
  if (!Number.isSafeInteger(value)) {
    throw new CompatError(versionParseError(text, `${field} is out of range`));
  }
  return value;
}

function compareNumbers(a: number, b: number): Ordering {
  if (a === b) return Ordering.Equal;
  return a < b ? Ordering.Less : Ordering.Greater;
}

/** A release outranks any prerelease of the same major.minor.patch. */
function comparePrerelease(a: string | undefined, b: string | undefined): Ordering {
  if (a === undefined && b === undefined) return Ordering.Equal;
  if (a === undefined) return Ordering.Greater;
  if (b === undefined) return Ordering.Less;

  const left = a.split('.');
  const right = b.split('.');
  const length = Math.min(left.length, right.length);
  for (let i = 0; i < length; i++) {
    const order = compareIdentifiers(left[i], right[i]);
    if (order !== Ordering.Equal) return order;
  }
  return compareNumbers(left.length, right.length);
}

/** Numeric identifiers compare numerically and rank below alphanumeric ones. */
function compareIdentifiers(a: string, b: string): Ordering {
  const aNumeric = NUMERIC_IDENTIFIER.test(a);
  const bNumeric = NUMERIC_IDENTIFIER.test(b);
  if (aNumeric && bNumeric) return compareNumbers(Number(a), Number(b));
  if (aNumeric) return Ordering.Less;
  if (bNumeric) return Ordering.Greater;
  if (a === b) return Ordering.Equal;
  return a < b ? Ordering.Less : Ordering.Greater;
}
