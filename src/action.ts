import { promises as fs } from 'fs';
import { Probot, ProbotOctokit } from 'probot';

import { getSettings } from './config';
import { PULL_REQUEST_EVENTS } from './constants';
import { LogLevel } from './enums';
import { ConfigurationError } from './errors';
import probotHandler from './index';
import { getEnvVar } from './utils/env-util';
import { log } from './utils/log-util';

/**
 * Lists the messages behind a failure, unwrapping the aggregate error
 * Probot raises when event handlers reject.
 */
export const errorMessages = (err: unknown): string[] => {
  if (
    typeof err === 'object' &&
    err !== null &&
    'errors' in err &&
    Array.isArray(err.errors) &&
    err.errors.length > 0
  ) {
    return err.errors.flatMap(errorMessages);
  }
  return [err instanceof Error ? err.message : String(err)];
};

/**
 * Delivers the pull request event that triggered the workflow run to the
 * backport handler.
 */
export const run = async (
  Octokit: typeof ProbotOctokit = ProbotOctokit,
): Promise<void> => {
  const settings = getSettings();
  if (!settings.runCheck && !settings.runMilestone) {
    log('run', LogLevel.INFO, 'Backport checks are disabled - nothing to do');
    return;
  }

  const eventName = getEnvVar('GITHUB_EVENT_NAME');
  if (!PULL_REQUEST_EVENTS.includes(eventName)) {
    throw new ConfigurationError(
      `Event name: ${eventName} is not a pull request event`,
    );
  }

  const eventPath = getEnvVar('GITHUB_EVENT_PATH');
  const payload = JSON.parse(await fs.readFile(eventPath, 'utf8'));

  const robot = new Probot({
    githubToken: getEnvVar('GITHUB_TOKEN'),
    Octokit,
  });
  await robot.load(probotHandler);

  // pull_request_target carries the same payload as pull_request.
  await robot.receive({
    id: getEnvVar('GITHUB_RUN_ID', 'local'),
    name: 'pull_request',
    payload,
  });
};

if (require.main === module) {
  run().catch((err: unknown) => {
    for (const message of errorMessages(err)) {
      log('run', LogLevel.ERROR, message);
    }
    process.exitCode = 1;
  });
}
