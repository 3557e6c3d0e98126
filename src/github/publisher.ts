import { z } from 'zod';
import { PublishError, errorMessage } from '../analyzer/errors.js';
import { GitCommandError, runGit } from './git.js';
import { authenticatedRemote, type RepositoryRef } from './repository.js';
import type { Branch, ChangePublisher, GitHubCredentials, PullRequestRef } from '../analyzer/types.js';

const GITHUB_API = 'https://api.github.com';

export interface GitHubPublisherOptions {
  credentials: GitHubCredentials;
  /** Working copy to publish from */
  cwd: string;
  repository: RepositoryRef;
  /** Base branch of the pull request; defaults to the branch checked out when the first branch is created */
  baseBranch?: string;
  fetch?: typeof fetch;
}

const pullRequestResponseSchema = z.object({
  html_url: z.string().optional(),
  number: z.number().optional(),
  message: z.string().optional(),
});

/**
 * Publishes a working copy through git and the GitHub REST API.
 * The commit identity is passed per command, so no global git
 * configuration is touched.
 */
export class GitHubPublisher implements ChangePublisher {
  private baseBranch: string | undefined;
  private readonly fetchImpl: typeof fetch;

  constructor(private readonly options: GitHubPublisherOptions) {
    this.baseBranch = options.baseBranch;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async createBranch(name: string): Promise<Branch> {
    if (!this.baseBranch) {
      const { stdout } = await this.git(['rev-parse', '--abbrev-ref', 'HEAD']);
      this.baseBranch = stdout.trim();
    }
    await this.git(['checkout', '-B', name]);
    return { name };
  }

  async commit(message: string): Promise<void> {
    await this.git(['add', '--all']);
    const { username, email } = this.options.credentials;
    await this.git(['-c', `user.name=${username}`, '-c', `user.email=${email}`, 'commit', '-m', message]);
  }

  async push(branch: Branch): Promise<void> {
    const remote = authenticatedRemote(this.options.repository, this.options.credentials.token);
    await this.git(['push', '--force', remote, `HEAD:refs/heads/${branch.name}`]);
  }

  async openPullRequest(title: string, body: string, branch: Branch): Promise<PullRequestRef> {
    const { owner, repo } = this.options.repository;
    let response: Response;
    try {
      response = await this.fetchImpl(`${GITHUB_API}/repos/${owner}/${repo}/pulls`, {
        method: 'POST',
        headers: {
          Accept: 'application/vnd.github+json',
          Authorization: `Bearer ${this.options.credentials.token}`,
          'Content-Type': 'application/json',
          'X-GitHub-Api-Version': '2022-11-28',
        },
        body: JSON.stringify({ title, body, head: branch.name, base: this.baseBranch ?? 'main' }),
      });
    } catch (err) {
      throw new PublishError(`Error creating pull request: ${errorMessage(err)}`, null, { cause: err });
    }

    const json: unknown = await response.json().catch(() => ({}));
    const parsed = pullRequestResponseSchema.safeParse(json);
    const payload: z.infer<typeof pullRequestResponseSchema> = parsed.success ? parsed.data : {};
    if (!response.ok) {
      throw new PublishError(`Error creating pull request: ${payload.message ?? response.statusText}`, response.status);
    }

    return {
      url: payload.html_url ?? null,
      number: payload.number ?? null,
    };
  }

  private async git(args: string[]) {
    try {
      return await runGit(args, this.options.cwd);
    } catch (err) {
      const status = err instanceof GitCommandError ? err.exitCode : null;
      throw new PublishError(errorMessage(err), status, { cause: err });
    }
  }
}
