import { Context } from 'probot';

export type WebHookPRContext = Context<'pull_request'>;
export type WebHookRepoContext = Pick<WebHookPRContext, 'octokit' | 'repo'>;
export type RepoOctokit = WebHookPRContext['octokit'];
