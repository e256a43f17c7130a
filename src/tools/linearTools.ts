// src/tools/linearTools.ts
import { z } from "zod";
import { LinearClient, type FetchLike } from "../clients/linearClient";
import { config } from "../config/env";
import type { ServiceAdapter, ServiceDescriptor, ToolContext, ToolSpec } from "../types/mcp";

export const listTeamsInput = z.object({});

export const listTicketsInput = z.object({
  team_id: z.string().min(1).optional().describe("Team ID to filter tickets by"),
  state: z.string().min(1).optional().describe("Workflow state name, e.g. Todo or In Progress"),
  first: z.number().int().min(1).max(250).default(50).describe("Maximum number of tickets"),
});

export const getMemberInput = z.object({
  user_id: z.string().min(1).optional().describe("Member ID; the API key's owner when neither key is given"),
  email: z.string().email().optional().describe("Member email, used when user_id is absent"),
});

export const createTicketInput = z.object({
  team_id: z.string().min(1).describe("Team ID"),
  title: z.string().min(1).describe("Ticket title"),
  description: z.string().optional().describe("Ticket description (markdown)"),
  priority: z.number().int().min(0).max(4).optional().describe("0 none, 1 urgent ... 4 low"),
});

const tools: ToolSpec[] = [
  { name: "list_teams", description: "List Linear teams", inputContract: listTeamsInput },
  { name: "list_tickets", description: "List Linear issues", inputContract: listTicketsInput },
  { name: "get_member", description: "Get a Linear workspace member", inputContract: getMemberInput },
  { name: "create_ticket", description: "Create a new Linear issue", inputContract: createTicketInput },
];

export class LinearService implements ServiceAdapter {
  constructor(
    private readonly client: LinearClient,
    private readonly endpoint: string
  ) {}

  describe(): ServiceDescriptor {
    return {
      id: "linear",
      displayName: "Linear",
      description: "Linear API service for project and issue tracking",
      baseEndpoint: this.endpoint,
      credentialRef: "LINEAR_API_KEY",
    };
  }

  listTools(): ToolSpec[] {
    return tools;
  }

  async handle(toolName: string, params: unknown, context: ToolContext): Promise<unknown> {
    const auth = { apiKey: context.credential, signal: context.signal };

    switch (toolName) {
      case "list_teams":
        return this.client.listTeams(auth);
      case "list_tickets": {
        const input = listTicketsInput.parse(params);
        return this.client.listTickets(
          { teamId: input.team_id, state: input.state, first: input.first },
          auth
        );
      }
      case "get_member": {
        const input = getMemberInput.parse(params);
        return this.client.getMember({ userId: input.user_id, email: input.email }, auth);
      }
      case "create_ticket": {
        const input = createTicketInput.parse(params);
        return this.client.createTicket(
          {
            teamId: input.team_id,
            title: input.title,
            description: input.description,
            priority: input.priority,
          },
          auth
        );
      }
      default:
        throw new Error(`Linear adapter has no tool '${toolName}'`);
    }
  }
}

export function createLinearService(
  endpoint: string = config.linear.baseUrl,
  fetchImpl?: FetchLike
): LinearService {
  return new LinearService(new LinearClient(endpoint, fetchImpl), endpoint);
}
