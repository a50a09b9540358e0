/**
 * Version constraints.
 *
 * Grammar:
 *   constraint := set ( "||" set )*
 *   set        := term ( whitespace term )*          all terms must hold
 *   term       := [op] partial
 *   op         := "=" | ">" | ">=" | "<" | "<=" | "^" | "~"
 *   partial    := "*" | "x" | N | N.x | N.N | N.N.x | N.N.N[-pre][+build]
 *
 * Caret, tilde and partial versions expand to plain comparators when the
 * constraint is parsed, so matching only ever evaluates comparators, each
 * on version precedence alone: 2.0.0-alpha.1 satisfies ">=1.0.0".
 */

import { CompatError, constraintParseError } from '../domain/errors';
import { Version } from '../domain/version';
import { Ordering, compareVersions, createVersion, formatVersion, parseVersion } from './parser';

export type ComparatorOperator = '=' | '>' | '>=' | '<' | '<=';

export interface Comparator {
  operator: ComparatorOperator;
  version: Version;
}

export interface Constraint {
  raw: string;
  /** Alternatives joined by "||"; each is a conjunction of comparators. */
  sets: Comparator[][];
}

type TermOperator = ComparatorOperator | '^' | '~';

/** A version with trailing wildcard parts left undefined. */
interface PartialVersion {
  major?: number;
  minor?: number;
  patch?: number;
  prerelease?: string;
}

const OPERATOR_ONLY = /^(>=|<=|>|<|=|\^|~)$/;
const TERM_PATTERN = /^(>=|<=|>|<|=|\^|~)?(.+)$/;
const WILDCARD = /^[xX*]$/;
const NUMBER = /^(0|[1-9]\d*)$/;

/** Parse constraint text. Throws CompatError (CONSTRAINT.PARSE) when malformed. */
export function parseConstraint(text: string): Constraint {
  const raw = text.trim();
  if (raw.length === 0) {
    throw new CompatError(constraintParseError(text, 'constraint is empty'));
  }

  const sets = raw.split('||').map((alternative) => {
    const tokens = tokenize(alternative.trim());
    if (tokens.length === 0) {
      throw new CompatError(constraintParseError(text, 'empty alternative around "||"'));
    }
    return tokens.flatMap((token) => parseTerm(text, token));
  });

  return { raw, sets };
}

/** Whether `version` satisfies `constraint`. */
export function satisfies(version: Version, constraint: string | Constraint): boolean {
  const parsed = typeof constraint === 'string' ? parseConstraint(constraint) : constraint;
  return parsed.sets.some((set) => satisfiesSet(version, set));
}

export function formatComparator(comparator: Comparator): string {
  return `${comparator.operator}${formatVersion(comparator.version)}`;
}

/** Canonical text of a parsed constraint, e.g. ">=1.2.0 <2.0.0". */
export function formatConstraint(constraint: Constraint): string {
  return constraint.sets
    .map((set) => (set.length === 0 ? '*' : set.map(formatComparator).join(' ')))
    .join(' || ');
}

function satisfiesSet(version: Version, set: Comparator[]): boolean {
  return set.every((comparator) => testComparator(version, comparator));
}

function testComparator(version: Version, comparator: Comparator): boolean {
  const order = compareVersions(version, comparator.version);
  switch (comparator.operator) {
    case '=':
      return order === Ordering.Equal;
    case '>':
      return order === Ordering.Greater;
    case '>=':
      return order !== Ordering.Less;
    case '<':
      return order === Ordering.Less;
    case '<=':
      return order !== Ordering.Greater;
  }
}

/** Split on whitespace, gluing a bare operator to the version after it. */
function tokenize(alternative: string): string[] {
  const parts = alternative.split(/\s+/).filter((part) => part.length > 0);
  const tokens: string[] = [];
  for (let i = 0; i < parts.length; i++) {
    if (OPERATOR_ONLY.test(parts[i]) && i + 1 < parts.length) {
      tokens.push(parts[i] + parts[i + 1]);
      i++;
    } else {
      tokens.push(parts[i]);
    }
  }
  return tokens;
}

function parseTerm(text: string, token: string): Comparator[] {
  const match = TERM_PATTERN.exec(token);
  if (!match) {
    throw new CompatError(constraintParseError(text, `unrecognized term "${token}"`));
  }
  const operator: TermOperator = toTermOperator(match[1]);
  const partial = parsePartial(text, match[2]);

  if (partial.major === undefined) {
    if (operator === '>' || operator === '<') {
      throw new CompatError(constraintParseError(text, `"${token}" can never be satisfied`));
    }
    return [];
  }

  const { major } = partial;
  if (partial.minor === undefined) {
    return expandMajor(operator, major);
  }
  if (partial.patch === undefined) {
    return expandMinor(operator, major, partial.minor);
  }
  return expandFull(operator, createVersion(major, partial.minor, partial.patch, partial.prerelease));
}

function toTermOperator(text: string | undefined): TermOperator {
  switch (text) {
    case '>':
    case '>=':
    case '<':
    case '<=':
    case '^':
    case '~':
      return text;
    default:
      return '=';
  }
}

function parsePartial(text: string, body: string): PartialVersion {
  const fullAttempt = /^\d+\.\d+\.\d+[-+]/.test(body) || /^\d+\.\d+\.\d+$/.test(body);
  if (fullAttempt) {
    try {
      return parseVersion(body);
    } catch (err) {
      if (err instanceof CompatError) {
        throw new CompatError(constraintParseError(text, err.typedError.message));
      }
      throw err;
    }
  }

  const fields = body.split('.');
  if (fields.length > 3) {
    throw new CompatError(constraintParseError(text, `"${body}" has too many version fields`));
  }

  const values: Array<number | undefined> = [];
  let wildcardSeen = false;
  for (const field of fields) {
    if (WILDCARD.test(field)) {
      wildcardSeen = true;
      values.push(undefined);
    } else if (NUMBER.test(field)) {
      if (wildcardSeen) {
        throw new CompatError(constraintParseError(text, `"${body}" has a number after a wildcard`));
      }
      values.push(Number(field));
    } else {
      throw new CompatError(constraintParseError(text, `"${field}" is not a version field`));
    }
  }

  return { major: values[0], minor: values[1], patch: values[2] };
}

function comparator(operator: ComparatorOperator, major: number, minor: number, patch: number): Comparator {
  return { operator, version: createVersion(major, minor, patch) };
}

/** Terms such as "1", "1.x", "^1", ">=1". */
function expandMajor(operator: TermOperator, major: number): Comparator[] {
  switch (operator) {
    case '>':
      return [comparator('>=', major + 1, 0, 0)];
    case '>=':
      return [comparator('>=', major, 0, 0)];
    case '<':
      return [comparator('<', major, 0, 0)];
    case '<=':
      return [comparator('<', major + 1, 0, 0)];
    default:
      return [comparator('>=', major, 0, 0), comparator('<', major + 1, 0, 0)];
  }
}

/** Terms such as "1.2", "1.2.x", "^0.2", "~1.2". */
function expandMinor(operator: TermOperator, major: number, minor: number): Comparator[] {
  switch (operator) {
    case '>':
      return [comparator('>=', major, minor + 1, 0)];
    case '>=':
      return [comparator('>=', major, minor, 0)];
    case '<':
      return [comparator('<', major, minor, 0)];
    case '<=':
      return [comparator('<', major, minor + 1, 0)];
    case '^':
      return major > 0
        ? [comparator('>=', major, minor, 0), comparator('<', major + 1, 0, 0)]
        : [comparator('>=', 0, minor, 0), comparator('<', 0, minor + 1, 0)];
    default:
      return [comparator('>=', major, minor, 0), comparator('<', major, minor + 1, 0)];
  }
}

/** Terms naming a complete version. */
function expandFull(operator: TermOperator, version: Version): Comparator[] {
  const { major, minor, patch } = version;
  switch (operator) {
    case '^':
      if (major > 0) return [{ operator: '>=', version }, comparator('<', major + 1, 0, 0)];
      if (minor > 0) return [{ operator: '>=', version }, comparator('<', 0, minor + 1, 0)];
      return [{ operator: '>=', version }, comparator('<', 0, 0, patch + 1)];
    case '~':
      return [{ operator: '>=', version }, comparator('<', major, minor + 1, 0)];
    default:
      return [{ operator, version }];
  }
}
