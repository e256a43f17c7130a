// src/clients/githubClient.ts
import axios, { type AxiosInstance, type AxiosRequestConfig } from "axios";
import { UpstreamError } from "../utils/errors";

export type Repo = {
  id: number;
  name: string;
  fullName: string;
  private: boolean;
  description: string | null;
  url: string;
};

export type Issue = {
  id: number;
  number: number;
  title: string;
  body: string | null;
  state: string;
  labels: string[];
  url: string;
};

export type GithubUser = {
  id: number;
  login: string;
  name: string | null;
  type: string;
  url: string;
};

// raw REST payloads, only the fields we read
type RepoPayload = {
  id: number;
  name: string;
  full_name: string;
  private: boolean;
  description: string | null;
  html_url: string;
};

type IssuePayload = {
  id: number;
  number: number;
  title: string;
  body?: string | null;
  state: string;
  labels: Array<string | { name?: string }>;
  html_url: string;
};

type UserPayload = {
  id: number;
  login: string;
  name?: string | null;
  type: string;
  html_url: string;
};

type RequestAuth = {
  token?: string;
  signal?: AbortSignal;
};

export function createGithubHttp(baseUrl: string): AxiosInstance {
  return axios.create({
    baseURL: baseUrl,
    headers: {
      Accept: "application/vnd.github+json",
      "X-GitHub-Api-Version": "2022-11-28",
      "User-Agent": "tool-gateway",
    },
  });
}

/** Turns an axios failure into an UpstreamError carrying GitHub's own message. */
export function toUpstreamError(err: unknown): unknown {
  if (!axios.isAxiosError(err)) return err;

  if (err.code === "ERR_CANCELED") {
    return new UpstreamError("GitHub request was cancelled", { code: "aborted", cause: err });
  }

  const res = err.response;
  if (!res) {
    return new UpstreamError(`GitHub is unreachable: ${err.message}`, {
      code: err.code ?? "network_error",
      cause: err,
    });
  }

  const body: unknown = res.data;
  const message =
    typeof body === "object" && body !== null && "message" in body && typeof body.message === "string"
      ? body.message
      : res.statusText || `HTTP ${res.status}`;
  const rateLimited =
    res.status === 429 || (res.status === 403 && String(res.headers["x-ratelimit-remaining"]) === "0");

  return new UpstreamError(`GitHub API responded ${res.status}: ${message}`, {
    status: res.status,
    code: rateLimited ? "rate_limited" : "http_error",
    detail: body,
    cause: err,
  });
}

function mapRepo(repo: RepoPayload): Repo {
  return {
    id: repo.id,
    name: repo.name,
    fullName: repo.full_name,
    private: repo.private,
    description: repo.description,
    url: repo.html_url,
  };
}

function mapIssue(issue: IssuePayload): Issue {
  return {
    id: issue.id,
    number: issue.number,
    title: issue.title,
    body: issue.body ?? null,
    state: issue.state,
    labels: issue.labels
      .map((label) => (typeof label === "string" ? label : label.name ?? ""))
      .filter((name) => name.length > 0),
    url: issue.html_url,
  };
}

export class GithubClient {
  constructor(private readonly http: AxiosInstance) {}

  async listRepos(
    input: { owner?: string; includePrivate: boolean },
    auth: RequestAuth
  ): Promise<Repo[]> {
    const data = input.owner
      ? await this.get<RepoPayload[]>(`/users/${encodeURIComponent(input.owner)}/repos`, auth)
      : await this.get<RepoPayload[]>("/user/repos", auth, {
          visibility: input.includePrivate ? "all" : "public",
        });

    const repos = data.map(mapRepo);
    return input.includePrivate ? repos : repos.filter((repo) => !repo.private);
  }

  // GitHub's `labels` filter requires every label; one request per label gives "any of"
  async listIssues(
    input: { owner: string; repo: string; state: string; labels: string[] },
    auth: RequestAuth
  ): Promise<Issue[]> {
    const path = this.repoPath(input, "/issues");
    const pages =
      input.labels.length === 0
        ? [await this.get<IssuePayload[]>(path, auth, { state: input.state })]
        : await Promise.all(
            input.labels.map((label) =>
              this.get<IssuePayload[]>(path, auth, { state: input.state, labels: label })
            )
          );

    const seen = new Set<number>();
    const issues: Issue[] = [];
    for (const issue of pages.flat()) {
      if (seen.has(issue.id)) continue;
      seen.add(issue.id);
      issues.push(mapIssue(issue));
    }
    return issues.sort((a, b) => b.number - a.number);
  }

  async getUser(lookup: { username?: string; userId?: number }, auth: RequestAuth): Promise<GithubUser> {
    const path =
      lookup.userId !== undefined
        ? `/user/${lookup.userId}`
        : `/users/${encodeURIComponent(lookup.username ?? "")}`;
    const user = await this.get<UserPayload>(path, auth);
    return {
      id: user.id,
      login: user.login,
      name: user.name ?? null,
      type: user.type,
      url: user.html_url,
    };
  }

  async createIssue(
    input: { owner: string; repo: string; title: string; body?: string; labels?: string[] },
    auth: RequestAuth
  ): Promise<Issue> {
    try {
      const res = await this.http.post<IssuePayload>(
        this.repoPath(input, "/issues"),
        { title: input.title, body: input.body, labels: input.labels },
        this.requestConfig(auth)
      );
      return mapIssue(res.data);
    } catch (err) {
      throw toUpstreamError(err);
    }
  }

  private repoPath(input: { owner: string; repo: string }, suffix: string): string {
    return `/repos/${encodeURIComponent(input.owner)}/${encodeURIComponent(input.repo)}${suffix}`;
  }

  private requestConfig(auth: RequestAuth, params?: Record<string, string>): AxiosRequestConfig {
    return {
      params,
      signal: auth.signal,
      headers: auth.token ? { Authorization: `Bearer ${auth.token}` } : undefined,
    };
  }

  private async get<T>(path: string, auth: RequestAuth, params?: Record<string, string>): Promise<T> {
    try {
      const res = await this.http.get<T>(path, this.requestConfig(auth, params));
      return res.data;
    } catch (err) {
      throw toUpstreamError(err);
    }
  }
}
