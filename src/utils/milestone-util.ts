import { LogLevel } from '../enums';
import { LookupError } from '../errors';
import { ReleaseVersion, RepoMilestone } from '../interfaces';
import { log } from './log-util';
import {
  compareVersions,
  formatVersion,
  getMilestonePattern,
  parseVersion,
} from './version-util';

/**
 * Returns the part of a backport branch name milestones are matched
 * against, e.g. `v1.2` for `v1.2.x`.
 */
export const branchMilestonePrefix = (branchName: string) =>
  branchName.split('.x')[0];

/**
 * Picks the open milestone with the greatest version among those whose
 * title is a release version containing `titlePrefix`.
 *
 * @param milestones - the repository's open milestones
 * @param titlePrefix - text the milestone title must contain; empty matches any release milestone
 * @param tagPrefix - literal text expected before the version number
 */
export const findBranchMilestone = (
  milestones: RepoMilestone[],
  titlePrefix: string,
  tagPrefix: string,
): RepoMilestone => {
  const pattern = getMilestonePattern(tagPrefix);
  let best: { milestone: RepoMilestone; version: ReleaseVersion } | null =
    null;

  for (const milestone of milestones) {
    if (!pattern.test(milestone.title)) continue;
    if (!milestone.title.includes(titlePrefix)) continue;

    const version = parseVersion(milestone.title, tagPrefix);
    if (!version) continue;

    if (!best || compareVersions(version, best.version) > 0) {
      best = { milestone, version };
    }
  }

  if (!best) {
    throw new LookupError(`No milestones found matching: ${titlePrefix}`);
  }

  log(
    'findBranchMilestone',
    LogLevel.LOG,
    `Resolved '${titlePrefix}' to milestone ${formatVersion(best.version)}`,
  );
  return best.milestone;
};
