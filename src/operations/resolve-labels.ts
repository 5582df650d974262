import { LogLevel } from '../enums';
import {
  BackportSettings,
  RepoClient,
  RepoLabel,
  RepoMilestone,
  ResolvedLabels,
  VersionedLabel,
} from '../interfaces';
import { checkLabelDescription, isBackportLabel } from '../utils/label-utils';
import { log } from '../utils/log-util';
import {
  branchMilestonePrefix,
  findBranchMilestone,
} from '../utils/milestone-util';
import { parseVersion } from '../utils/version-util';

const toVersionedLabel = (
  label: RepoLabel,
  branch: VersionedLabel['branch'],
  milestone: RepoMilestone | null,
  settings: BackportSettings,
): VersionedLabel =>
  Object.freeze({
    label,
    branch,
    milestone,
    version: milestone
      ? parseVersion(milestone.title, settings.tagPrefix)
      : null,
  });

/**
 * Binds a backport label to its branch and, when milestones are enabled,
 * to the newest open milestone of that branch.
 *
 * @param milestones - the open milestones, or null when milestones are disabled
 */
export const resolveBackportLabel = async (
  client: RepoClient,
  label: RepoLabel,
  milestones: RepoMilestone[] | null,
  settings: BackportSettings,
): Promise<VersionedLabel> => {
  const branchName = checkLabelDescription(label, settings);
  const branch = await client.getBranch(branchName);

  const milestone = milestones
    ? findBranchMilestone(
        milestones,
        branchMilestonePrefix(branch.name),
        settings.tagPrefix,
      )
    : null;

  return toVersionedLabel(label, branch, milestone, settings);
};

/**
 * Binds the no-backport label to the default branch and the newest open
 * release milestone.
 */
export const resolveNoBackportLabel = async (
  client: RepoClient,
  defaultBranch: string,
  milestones: RepoMilestone[] | null,
  settings: BackportSettings,
): Promise<VersionedLabel> => {
  const label = await client.getLabel(settings.noBackportLabel);
  const branch = await client.getBranch(defaultBranch);
  const milestone = milestones
    ? findBranchMilestone(milestones, '', settings.tagPrefix)
    : null;

  return toVersionedLabel(label, branch, milestone, settings);
};

/**
 * Resolves every backport label of the repository plus the no-backport
 * label, keyed by label name as the repository spells it.
 */
export const resolveVersionedLabels = async (
  client: RepoClient,
  defaultBranch: string,
  settings: BackportSettings,
): Promise<ResolvedLabels> => {
  const milestones = settings.runMilestone
    ? await client.listOpenMilestones()
    : null;

  const resolved = new Map<string, VersionedLabel>();
  for (const label of await client.listLabels()) {
    if (!isBackportLabel(label, settings)) continue;
    resolved.set(
      label.name,
      await resolveBackportLabel(client, label, milestones, settings),
    );
  }

  const noBackport = await resolveNoBackportLabel(
    client,
    defaultBranch,
    milestones,
    settings,
  );
  resolved.set(noBackport.label.name, noBackport);

  log(
    'resolveVersionedLabels',
    LogLevel.LOG,
    `Resolved ${resolved.size} backport labels`,
  );
  return { backportLabels: resolved, noBackportLabel: noBackport.label.name };
};
