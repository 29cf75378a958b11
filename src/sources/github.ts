import { Octokit } from "@octokit/rest";
import { toUpstreamFetchError } from "../errors";
import type { ChangeSource, CommentPublisher, RawChangeRecord } from "../types";

interface PullRequestFile {
  filename: string;
  status: string;
  additions: number;
  deletions: number;
}

export function toRawChangeRecord(file: PullRequestFile): RawChangeRecord {
  return {
    filename: file.filename,
    status: file.status,
    additions: file.additions,
    deletions: file.deletions,
  };
}

export function createOctokit(token: string | undefined = process.env.GITHUB_TOKEN): Octokit {
  if (!token) {
    throw new Error("GITHUB_TOKEN environment variable is required");
  }
  return new Octokit({ auth: token });
}

export class GitHubChangeSource implements ChangeSource {
  constructor(private readonly octokit: Octokit) {}

  async listChangedFiles(
    owner: string,
    repo: string,
    pullNumber: number
  ): Promise<RawChangeRecord[]> {
    try {
      const files = await this.octokit.paginate(this.octokit.pulls.listFiles, {
        owner,
        repo,
        pull_number: pullNumber,
        per_page: 100,
      });
      return files.map(toRawChangeRecord);
    } catch (error) {
      throw toUpstreamFetchError(
        "github",
        error,
        `Listing changed files of ${owner}/${repo}#${pullNumber}`
      );
    }
  }
}

export class GitHubCommentPublisher implements CommentPublisher {
  constructor(private readonly octokit: Octokit) {}

  async publish(
    owner: string,
    repo: string,
    pullNumber: number,
    body: string
  ): Promise<string> {
    try {
      const { data } = await this.octokit.issues.createComment({
        owner,
        repo,
        issue_number: pullNumber,
        body,
      });
      return data.html_url;
    } catch (error) {
      throw toUpstreamFetchError(
        "github",
        error,
        `Commenting on ${owner}/${repo}#${pullNumber}`
      );
    }
  }
}
