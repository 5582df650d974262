import { describe, expect, it } from 'vitest';

import {
  compareVersions,
  formatVersion,
  getBranchPattern,
  getMilestonePattern,
  parseVersion,
} from '../src/utils/version-util';

describe('version-util', () => {
  describe('getBranchPattern()', () => {
    it('matches backport branches', () => {
      const pattern = getBranchPattern('');
      expect(pattern.test('1.2.x')).toBe(true);
      expect(pattern.test('10.21.x')).toBe(true);
      expect(pattern.test('1.2.3')).toBe(false);
      expect(pattern.test('1.x')).toBe(false);
      expect(pattern.test('v1.2.x')).toBe(false);
      expect(pattern.test('1.2.x-old')).toBe(false);
    });

    it('requires the tag prefix literally', () => {
      const pattern = getBranchPattern('v');
      expect(pattern.test('v1.2.x')).toBe(true);
      expect(pattern.test('1.2.x')).toBe(false);
    });

    it('does not treat the tag prefix as a regex', () => {
      const pattern = getBranchPattern('r.');
      expect(pattern.test('r.1.2.x')).toBe(true);
      expect(pattern.test('rx1.2.x')).toBe(false);
    });
  });

  describe('getMilestonePattern()', () => {
    it('matches major.minor and major.minor.patch titles', () => {
      const pattern = getMilestonePattern('');
      expect(pattern.test('1.3')).toBe(true);
      expect(pattern.test('1.3.1')).toBe(true);
      expect(pattern.test('1.3.1.2')).toBe(false);
      expect(pattern.test('Backlog')).toBe(false);
      expect(pattern.test('1.3 planning')).toBe(false);
    });
  });

  describe('parseVersion()', () => {
    it('parses a version with and without a patch', () => {
      expect(parseVersion('1.3', '')).toStrictEqual({ major: 1, minor: 3 });
      expect(parseVersion('v2.10.4', 'v')).toStrictEqual({
        major: 2,
        minor: 10,
        patch: 4,
      });
    });

    it('returns null for titles that are not versions', () => {
      expect(parseVersion('next', '')).toBeNull();
      expect(parseVersion('1.3', 'v')).toBeNull();
    });
  });

  describe('compareVersions()', () => {
    it('orders numerically rather than lexically', () => {
      expect(
        compareVersions({ major: 1, minor: 10 }, { major: 1, minor: 9 }),
      ).toBeGreaterThan(0);
      expect(
        compareVersions({ major: 2, minor: 0 }, { major: 10, minor: 0 }),
      ).toBeLessThan(0);
    });

    it('sorts a missing patch below every patch', () => {
      expect(
        compareVersions(
          { major: 1, minor: 3 },
          { major: 1, minor: 3, patch: 0 },
        ),
      ).toBeLessThan(0);
      expect(
        compareVersions(
          { major: 1, minor: 3 },
          { major: 1, minor: 2, patch: 9 },
        ),
      ).toBeGreaterThan(0);
    });

    it('treats identical versions as equal', () => {
      expect(
        compareVersions(
          { major: 1, minor: 3, patch: 1 },
          { major: 1, minor: 3, patch: 1 },
        ),
      ).toBe(0);
    });
  });

  it('formats versions', () => {
    expect(formatVersion({ major: 1, minor: 3 })).toBe('1.3');
    expect(formatVersion({ major: 1, minor: 3, patch: 1 })).toBe('1.3.1');
  });
});
