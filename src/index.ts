import { ApplicationFunction } from 'probot';

import { getSettings } from './config';
import { checkBackportLabels } from './operations/check-labels';
import { buildPullRequestContext } from './operations/pull-request';
import { setMilestone } from './operations/set-milestone';
import { createRepoClient } from './utils/github-util';

const probotHandler: ApplicationFunction = (robot) => {
  /**
   * Verifies that a PR carries its backport information, i.e.: at
   * least one `backport-X.Y.x` label or a lone `no-backport` label, then
   * files it under the earliest release it will ship in.
   */
  robot.on('pull_request', async (context) => {
    const settings = getSettings();
    const { pull_request: pr, repository } = context.payload;

    if (!settings.runCheck && !settings.runMilestone) {
      robot.log.info(`Backport checks are disabled - skipping #${pr.number}`);
      return;
    }

    robot.log.info(`Checking backport information for #${pr.number}`);

    const client = createRepoClient(context);
    const prContext = await buildPullRequestContext(
      client,
      {
        number: pr.number,
        labels: pr.labels.map((label) => label.name),
        defaultBranch: repository.default_branch,
      },
      settings,
    );

    checkBackportLabels(prContext, settings);
    await setMilestone(client, prContext, settings);
  });
};

export default probotHandler;
