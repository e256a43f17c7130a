// src/tools/githubTools.ts
import type { AxiosInstance } from "axios";
import { z } from "zod";
import { createGithubHttp, GithubClient } from "../clients/githubClient";
import { config } from "../config/env";
import type { ServiceAdapter, ServiceDescriptor, ToolContext, ToolSpec } from "../types/mcp";

const ownerRepo = {
  owner: z.string().min(1).describe("Repository owner (user or organisation)"),
  repo: z.string().min(1).describe("Repository name"),
};

export const listReposInput = z.object({
  owner: z.string().min(1).optional().describe("List this user's public repositories instead of the caller's"),
  include_private: z.boolean().default(false).describe("Whether to include private repositories"),
});

export const listIssuesInput = z.object({
  ...ownerRepo,
  state: z.enum(["open", "closed", "all"]).default("open").describe("Issue state"),
  labels: z.array(z.string()).default([]).describe("Return issues carrying any of these labels"),
});

export const getUserInput = z
  .object({
    user_id: z.number().int().positive().optional().describe("GitHub account ID"),
    username: z.string().min(1).optional().describe("GitHub login"),
  })
  .refine((input) => input.user_id !== undefined || input.username !== undefined, {
    message: "Either user_id or username is required",
  });

export const createIssueInput = z.object({
  ...ownerRepo,
  title: z.string().min(1).describe("Issue title"),
  body: z.string().optional().describe("Issue body"),
  labels: z.array(z.string()).optional().describe("Issue labels"),
});

const tools: ToolSpec[] = [
  { name: "list_repos", description: "List GitHub repositories", inputContract: listReposInput },
  { name: "list_issues", description: "List issues of a GitHub repository", inputContract: listIssuesInput },
  { name: "get_user", description: "Get a GitHub user by ID or username", inputContract: getUserInput },
  { name: "create_issue", description: "Create a new GitHub issue", inputContract: createIssueInput },
];

export class GithubService implements ServiceAdapter {
  constructor(
    private readonly client: GithubClient,
    private readonly baseUrl: string
  ) {}

  describe(): ServiceDescriptor {
    return {
      id: "github",
      displayName: "GitHub",
      description: "GitHub API service for repository and issue management",
      baseEndpoint: this.baseUrl,
      credentialRef: "GITHUB_TOKEN",
    };
  }

  listTools(): ToolSpec[] {
    return tools;
  }

  async handle(toolName: string, params: unknown, context: ToolContext): Promise<unknown> {
    const auth = { token: context.credential, signal: context.signal };

    switch (toolName) {
      case "list_repos": {
        const input = listReposInput.parse(params);
        return this.client.listRepos({ owner: input.owner, includePrivate: input.include_private }, auth);
      }
      case "list_issues":
        return this.client.listIssues(listIssuesInput.parse(params), auth);
      case "get_user": {
        const input = getUserInput.parse(params);
        return this.client.getUser({ userId: input.user_id, username: input.username }, auth);
      }
      case "create_issue":
        return this.client.createIssue(createIssueInput.parse(params), auth);
      default:
        throw new Error(`GitHub adapter has no tool '${toolName}'`);
    }
  }
}

export function createGithubService(
  baseUrl: string = config.github.baseUrl,
  http: AxiosInstance = createGithubHttp(baseUrl)
): GithubService {
  return new GithubService(new GithubClient(http), baseUrl);
}
