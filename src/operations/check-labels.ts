import { LogLevel } from '../enums';
import { PolicyViolation } from '../errors';
import { BackportSettings, PullRequestContext } from '../interfaces';
import { log } from '../utils/log-util';

const formatNames = (names: Iterable<string>) =>
  `[${Array.from(names, (name) => `'${name}'`).join(', ')}]`;

/**
 * Checks that the pull request carries backport labels, or the
 * no-backport label on its own.
 */
export const checkBackportLabels = (
  pr: PullRequestContext,
  settings: BackportSettings,
) => {
  if (!settings.runCheck) return;

  log('checkBackportLabels', LogLevel.INFO, 'Checking backport labels...');
  log(
    'checkBackportLabels',
    LogLevel.INFO,
    `Available backport labels: ${formatNames(pr.backportLabels.keys())}`,
  );
  log(
    'checkBackportLabels',
    LogLevel.INFO,
    `Found backport labels: ${formatNames(pr.labels)}`,
  );

  if (pr.labels.length === 0) {
    throw new PolicyViolation('PR requires backport labeling');
  }

  if (pr.labels.includes(pr.noBackportLabel) && pr.labels.length > 1) {
    throw new PolicyViolation(
      `PR has both a ${pr.noBackportLabel} and backport labels`,
    );
  }
};
