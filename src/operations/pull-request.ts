import {
  BackportSettings,
  PullRequestContext,
  PullRequestOptions,
  RepoClient,
} from '../interfaces';
import { resolveVersionedLabels } from './resolve-labels';

/**
 * Collects the repository's backport labels and the subset of them
 * present on the pull request.
 */
export const buildPullRequestContext = async (
  client: RepoClient,
  pr: PullRequestOptions,
  settings: BackportSettings,
): Promise<PullRequestContext> => {
  const { backportLabels, noBackportLabel } = await resolveVersionedLabels(
    client,
    pr.defaultBranch,
    settings,
  );

  return Object.freeze({
    backportLabels,
    labels: pr.labels.filter((name) => backportLabels.has(name)),
    noBackportLabel,
    issueNumber: pr.number,
  });
};
