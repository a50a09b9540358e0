import {
  Ordering,
  compareVersions,
  createVersion,
  formatVersion,
  parseVersion,
  sortDescending,
  tryParseVersion,
  versionsEqual,
} from '../../src/semver/parser';
import { CompatError } from '../../src/domain/errors';

function parseErrorCode(text: string): string | undefined {
  try {
    parseVersion(text);
    return undefined;
  } catch (err) {
    return err instanceof CompatError ? err.typedError.code : 'NOT_COMPAT_ERROR';
  }
}

describe('parseVersion', () => {
  test('parses major.minor.patch', () => {
    expect(parseVersion('1.2.3')).toEqual({ major: 1, minor: 2, patch: 3 });
  });

  test('parses a prerelease tag', () => {
    const version = parseVersion('2.0.0-rc.1');
    expect(version.prerelease).toBe('rc.1');
    expect(formatVersion(version)).toBe('2.0.0-rc.1');
  });

  test('discards build metadata', () => {
    expect(parseVersion('1.0.0+build.7')).toEqual({ major: 1, minor: 0, patch: 0 });
    expect(formatVersion(parseVersion('1.0.0-beta+exp.sha.5114f85'))).toBe('1.0.0-beta');
  });

  test('trims surrounding whitespace', () => {
    expect(formatVersion(parseVersion('  3.4.5 '))).toBe('3.4.5');
  });

  test('returns frozen values without a prerelease key for releases', () => {
    const version = parseVersion('1.2.3');
    expect(Object.isFrozen(version)).toBe(true);
    expect('prerelease' in version).toBe(false);
  });

  test.each(['1', '1.2', '1.2.3.4', 'v1.2.3', '1.2.x', '', '1.2.3-', '1.2.3-beta..1', '-1.2.3'])(
    'rejects malformed text %j',
    (text) => {
      expect(parseErrorCode(text)).toBe('VERSION.PARSE');
    },
  );

  test('rejects leading zeros in numeric fields', () => {
    expect(parseErrorCode('01.2.3')).toBe('VERSION.PARSE');
    expect(parseErrorCode('1.02.3')).toBe('VERSION.PARSE');
    expect(parseErrorCode('1.2.03')).toBe('VERSION.PARSE');
    expect(parseErrorCode('1.2.3-01')).toBe('VERSION.PARSE');
  });

  test('accepts zero and alphanumeric identifiers that start with zero', () => {
    expect(formatVersion(parseVersion('0.0.0'))).toBe('0.0.0');
    expect(formatVersion(parseVersion('1.0.0-0alpha'))).toBe('1.0.0-0alpha');
    expect(formatVersion(parseVersion('1.0.0-0'))).toBe('1.0.0-0');
  });

  test('rejects numbers beyond the safe integer range', () => {
    expect(parseErrorCode('99999999999999999999.0.0')).toBe('VERSION.PARSE');
  });

  test('error carries the input and a format hint', () => {
    let caught: unknown;
    try {
      parseVersion('banana');
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(CompatError);
    if (caught instanceof CompatError) {
      expect(caught.typedError.details).toEqual({
        input: 'banana',
        reason: 'expected major.minor.patch[-prerelease]',
      });
      expect(caught.typedError.suggestedFixes[0].type).toBe('USE_FORMAT');
    }
  });

  test('tryParseVersion returns null instead of throwing', () => {
    expect(tryParseVersion('1.x')).toBeNull();
    expect(tryParseVersion('1.0.0')).toEqual({ major: 1, minor: 0, patch: 0 });
  });
});

describe('compareVersions', () => {
  const cmp = (a: string, b: string) => compareVersions(parseVersion(a), parseVersion(b));

  test('orders by major, then minor, then patch', () => {
    expect(cmp('2.0.0', '1.9.9')).toBe(Ordering.Greater);
    expect(cmp('1.3.0', '1.2.9')).toBe(Ordering.Greater);
    expect(cmp('1.2.3', '1.2.4')).toBe(Ordering.Less);
    expect(cmp('1.2.3', '1.2.3')).toBe(Ordering.Equal);
  });

  test('compares numerically, not lexically', () => {
    expect(cmp('1.10.0', '1.9.0')).toBe(Ordering.Greater);
  });

  test('a release outranks its prereleases', () => {
    expect(cmp('1.0.0-rc.1', '1.0.0')).toBe(Ordering.Less);
    expect(cmp('1.0.0', '1.0.0-rc.1')).toBe(Ordering.Greater);
  });

  test('follows prerelease precedence rules', () => {
    const ordered = [
      '1.0.0-alpha',
      '1.0.0-alpha.1',
      '1.0.0-alpha.beta',
      '1.0.0-beta',
      '1.0.0-beta.2',
      '1.0.0-beta.11',
      '1.0.0-rc.1',
      '1.0.0',
    ];
    for (let i = 0; i + 1 < ordered.length; i++) {
      expect(cmp(ordered[i], ordered[i + 1])).toBe(Ordering.Less);
      expect(cmp(ordered[i + 1], ordered[i])).toBe(Ordering.Greater);
    }
  });

  test('orders every pair of a mixed list consistently', () => {
    const ascending = [
      '0.9.9',
      '1.0.0-1',
      '1.0.0-2',
      '1.0.0-10',
      '1.0.0-alpha',
      '1.0.0-alpha.1',
      '1.0.0-alpha.1.1',
      '1.0.0-alpha.beta',
      '1.0.0-beta',
      '1.0.0-beta.2',
      '1.0.0-beta.11',
      '1.0.0-rc.1',
      '1.0.0',
      '1.0.1-0',
      '1.0.1',
      '1.10.0',
      '2.0.0-alpha.1',
      '2.0.0',
    ].map((text) => parseVersion(text));

    for (let i = 0; i < ascending.length; i++) {
      for (let j = 0; j < ascending.length; j++) {
        const order = compareVersions(ascending[i], ascending[j]);
        expect(Math.sign(order)).toBe(Math.sign(i - j));
        if (i !== j) {
          expect(compareVersions(ascending[j], ascending[i])).toBe(-order);
        }
      }
    }
  });

  test('build metadata does not affect precedence', () => {
    expect(versionsEqual(parseVersion('1.0.0+a'), parseVersion('1.0.0+b'))).toBe(true);
  });
});

describe('version helpers', () => {
  test('createVersion omits an undefined prerelease', () => {
    expect(createVersion(1, 0, 0)).toEqual({ major: 1, minor: 0, patch: 0 });
    expect(createVersion(1, 0, 0, 'beta').prerelease).toBe('beta');
  });

  test('sortDescending orders highest first without mutating input', () => {
    const items = ['1.0.0', '2.0.0-rc.1', '1.5.0', '2.0.0'].map((text) => ({
      name: text,
      version: parseVersion(text),
    }));
    const sorted = sortDescending(items);
    expect(sorted.map((item) => item.name)).toEqual(['2.0.0', '2.0.0-rc.1', '1.5.0', '1.0.0']);
    expect(items[0].name).toBe('1.0.0');
  });
});
