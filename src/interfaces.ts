import { CheckBackportLabels, SetMilestone } from './enums';

export interface BackportSettings {
  readonly checkBackportLabels: CheckBackportLabels;
  readonly setMilestone: SetMilestone;
  readonly noBackportLabel: string;
  readonly tagPrefix: string;
  readonly labelPrefix: string;
  /** Whether the backport label check runs. */
  readonly runCheck: boolean;
  /** Whether milestones are resolved and assigned. */
  readonly runMilestone: boolean;
  /** Whether an existing, different milestone may be replaced. */
  readonly overwrite: boolean;
}

export interface RepoLabel {
  name: string;
  description: string | null;
}

export interface RepoBranch {
  name: string;
}

export interface RepoMilestone {
  number: number;
  title: string;
}

export interface RepoIssue {
  number: number;
  milestone: RepoMilestone | null;
}

export interface ReleaseVersion {
  major: number;
  minor: number;
  patch?: number;
}

/**
 * The operations the checker needs from the hosting platform, scoped to a
 * single repository.
 */
export interface RepoClient {
  listLabels(): Promise<RepoLabel[]>;
  listOpenMilestones(): Promise<RepoMilestone[]>;
  getBranch(name: string): Promise<RepoBranch>;
  getLabel(name: string): Promise<RepoLabel>;
  getIssue(issueNumber: number): Promise<RepoIssue>;
  setMilestone(issueNumber: number, milestone: RepoMilestone): Promise<void>;
}

export interface VersionedLabel {
  readonly label: RepoLabel;
  readonly branch: RepoBranch;
  readonly milestone: RepoMilestone | null;
  readonly version: ReleaseVersion | null;
}

export interface ResolvedLabels {
  readonly backportLabels: Map<string, VersionedLabel>;
  /** The no-backport label's name as the repository spells it. */
  readonly noBackportLabel: string;
}

export interface PullRequestOptions {
  number: number;
  labels: string[];
  defaultBranch: string;
}

export interface PullRequestContext {
  readonly backportLabels: ReadonlyMap<string, VersionedLabel>;
  readonly labels: readonly string[];
  readonly noBackportLabel: string;
  readonly issueNumber: number;
}
