import { ReleaseVersion } from '../interfaces';

const MAJOR_MINOR_PATTERN = '([0-9]+)\\.([0-9]+)';
const BRANCH_NAME_PATTERN = `${MAJOR_MINOR_PATTERN}\\.x$`;
const MILESTONE_PATTERN = `${MAJOR_MINOR_PATTERN}(?:\\.([0-9]+))?$`;

const escapeRegExp = (value: string) =>
  value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

/**
 * @returns a Regex matching backport branch names such as `v1.2.x`.
 */
export const getBranchPattern = (tagPrefix: string) =>
  new RegExp(`^${escapeRegExp(tagPrefix)}${BRANCH_NAME_PATTERN}`, 'i');

/**
 * @returns a Regex matching release milestone titles such as `v1.2` or `v1.2.3`.
 */
export const getMilestonePattern = (tagPrefix: string) =>
  new RegExp(`^${escapeRegExp(tagPrefix)}${MILESTONE_PATTERN}`, 'i');

export const parseVersion = (
  title: string,
  tagPrefix: string,
): ReleaseVersion | null => {
  const match = getMilestonePattern(tagPrefix).exec(title);
  if (!match) return null;

  const [, major, minor, patch] = match;
  return {
    major: parseInt(major, 10),
    minor: parseInt(minor, 10),
    ...(patch === undefined ? {} : { patch: parseInt(patch, 10) }),
  };
};

// A missing patch sorts before every patch of the same major.minor.
function comparePart(a: number | undefined, b: number | undefined): number {
  return (a ?? -1) - (b ?? -1);
}

export const compareVersions = (a: ReleaseVersion, b: ReleaseVersion) =>
  comparePart(a.major, b.major) ||
  comparePart(a.minor, b.minor) ||
  comparePart(a.patch, b.patch);

export const formatVersion = ({ major, minor, patch }: ReleaseVersion) =>
  patch === undefined ? `${major}.${minor}` : `${major}.${minor}.${patch}`;
