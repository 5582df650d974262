import {
  BACKPORT_DESCRIPTION_PREFIX,
  LABEL_BRANCH_DELIMITER,
} from '../constants';
import { DescriptionMismatchError, FormatError } from '../errors';
import { BackportSettings, RepoLabel } from '../interfaces';
import { getBranchPattern } from './version-util';

/**
 * Settings are lower-cased on read, so label names are compared to them
 * ignoring case.
 */
export const isBackportLabel = (
  label: Pick<RepoLabel, 'name'>,
  settings: Pick<BackportSettings, 'labelPrefix' | 'noBackportLabel'>,
) => {
  const name = label.name.toLowerCase();
  return (
    name.startsWith(settings.labelPrefix) && name !== settings.noBackportLabel
  );
};

/**
 * Derives the branch a backport label targets from the label name,
 * e.g. `backport-v1.2.x` targets `v1.2.x`.
 *
 * @throws FormatError when the branch is not `<tag-prefix><major>.<minor>.x`
 */
export const labelToTargetBranch = (
  label: Pick<RepoLabel, 'name'>,
  settings: Pick<BackportSettings, 'tagPrefix'>,
) => {
  const [, ...rest] = label.name.split(LABEL_BRANCH_DELIMITER);
  const branch = rest.join(LABEL_BRANCH_DELIMITER);

  if (!getBranchPattern(settings.tagPrefix).test(branch)) {
    throw new FormatError(
      `Label name: ${label.name} does not match expected format`,
    );
  }

  return branch;
};

export const backportDescription = (branch: string) =>
  `${BACKPORT_DESCRIPTION_PREFIX}${branch}`;

/**
 * Ensures a backport label's description names the branch it targets.
 *
 * @returns the target branch name
 */
export const checkLabelDescription = (
  label: RepoLabel,
  settings: Pick<BackportSettings, 'tagPrefix'>,
) => {
  const branch = labelToTargetBranch(label, settings);
  if (label.description !== backportDescription(branch)) {
    throw new DescriptionMismatchError(
      `Label ${label.name} has incorrect description`,
    );
  }

  return branch;
};
