import { LogLevel } from '../enums';
import { LookupError, PolicyViolation } from '../errors';
import {
  BackportSettings,
  PullRequestContext,
  RepoClient,
  RepoMilestone,
  VersionedLabel,
} from '../interfaces';
import { log } from '../utils/log-util';
import { compareVersions } from '../utils/version-util';

const milestoneOf = ({ label, milestone }: VersionedLabel) => {
  if (!milestone) {
    throw new LookupError(`No milestone resolved for label ${label.name}`);
  }
  return milestone;
};

const versionOf = ({ label, version }: VersionedLabel) => {
  if (!version) {
    throw new LookupError(`No milestone resolved for label ${label.name}`);
  }
  return version;
};

/**
 * Works out the milestone a pull request belongs to.
 *
 * The no-backport label maps to the next release. Otherwise the label
 * with the lowest version wins, since a change backported to an older
 * branch also ships in every newer one.
 */
export const calculateMilestone = (pr: PullRequestContext): RepoMilestone => {
  const noBackport = pr.backportLabels.get(pr.noBackportLabel);
  if (noBackport && pr.labels.includes(pr.noBackportLabel)) {
    return milestoneOf(noBackport);
  }

  const present = pr.labels.flatMap((name) => {
    const label = pr.backportLabels.get(name);
    return label ? [label] : [];
  });
  if (present.length === 0) {
    throw new PolicyViolation('PR requires backport labeling');
  }

  const lowest = present.reduce((a, b) =>
    compareVersions(versionOf(b), versionOf(a)) < 0 ? b : a,
  );
  return milestoneOf(lowest);
};

/**
 * Assigns the calculated milestone to the pull request, refusing to
 * replace a different milestone unless overwriting is enabled.
 */
export const setMilestone = async (
  client: RepoClient,
  pr: PullRequestContext,
  settings: BackportSettings,
) => {
  if (!settings.runMilestone) return;

  log('setMilestone', LogLevel.INFO, 'Checking milestone...');

  const { milestone: current } = await client.getIssue(pr.issueNumber);
  const calculated = calculateMilestone(pr);

  log(
    'setMilestone',
    LogLevel.INFO,
    `Current milestone: ${current ? current.title : 'None'}`,
  );
  log(
    'setMilestone',
    LogLevel.INFO,
    `Calculated milestone: ${calculated.title}`,
  );

  if (
    current &&
    current.number !== calculated.number &&
    !settings.overwrite
  ) {
    throw new PolicyViolation(`PR already has milestone: ${current.title}`);
  }

  log(
    'setMilestone',
    LogLevel.INFO,
    `Setting milestone to: ${calculated.title}`,
  );
  await client.setMilestone(pr.issueNumber, calculated);
};
