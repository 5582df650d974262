import { LogLevel } from '../enums';
import { LookupError } from '../errors';
import {
  RepoBranch,
  RepoClient,
  RepoIssue,
  RepoLabel,
  RepoMilestone,
} from '../interfaces';
import { RepoOctokit, WebHookRepoContext } from '../types';
import { log } from './log-util';

const isNotFound = (err: unknown) =>
  typeof err === 'object' &&
  err !== null &&
  'status' in err &&
  err.status === 404;

/**
 * Repository operations backed by an authenticated Octokit instance.
 */
export class OctokitRepoClient implements RepoClient {
  constructor(
    private readonly octokit: RepoOctokit,
    private readonly repo: { owner: string; repo: string },
  ) {}

  private get slug() {
    return `${this.repo.owner}/${this.repo.repo}`;
  }

  async listLabels(): Promise<RepoLabel[]> {
    log('listLabels', LogLevel.INFO, `Fetching labels for ${this.slug}`);

    const labels = await this.octokit.paginate(
      this.octokit.issues.listLabelsForRepo,
      { ...this.repo, per_page: 100 },
    );
    return labels.map(({ name, description }) => ({ name, description }));
  }

  async listOpenMilestones(): Promise<RepoMilestone[]> {
    log(
      'listOpenMilestones',
      LogLevel.INFO,
      `Fetching open milestones for ${this.slug}`,
    );

    const milestones = await this.octokit.paginate(
      this.octokit.issues.listMilestones,
      { ...this.repo, state: 'open', per_page: 100 },
    );
    return milestones.map(({ number, title }) => ({ number, title }));
  }

  async getBranch(name: string): Promise<RepoBranch> {
    try {
      const { data } = await this.octokit.repos.getBranch({
        ...this.repo,
        branch: name,
      });
      return { name: data.name };
    } catch (err) {
      if (isNotFound(err)) {
        throw new LookupError(`Branch not found: ${name}`);
      }
      throw err;
    }
  }

  async getLabel(name: string): Promise<RepoLabel> {
    try {
      const { data } = await this.octokit.issues.getLabel({
        ...this.repo,
        name,
      });
      return { name: data.name, description: data.description };
    } catch (err) {
      if (isNotFound(err)) {
        throw new LookupError(`Label not found: ${name}`);
      }
      throw err;
    }
  }

  async getIssue(issueNumber: number): Promise<RepoIssue> {
    const { data } = await this.octokit.issues.get({
      ...this.repo,
      issue_number: issueNumber,
    });
    const { milestone } = data;

    return {
      number: data.number,
      milestone: milestone
        ? { number: milestone.number, title: milestone.title }
        : null,
    };
  }

  async setMilestone(
    issueNumber: number,
    milestone: RepoMilestone,
  ): Promise<void> {
    log(
      'setMilestone',
      LogLevel.INFO,
      `Setting milestone of #${issueNumber} to ${milestone.title}`,
    );

    await this.octokit.issues.update({
      ...this.repo,
      issue_number: issueNumber,
      milestone: milestone.number,
    });
  }
}

export const createRepoClient = (context: WebHookRepoContext): RepoClient =>
  new OctokitRepoClient(context.octokit, context.repo());
