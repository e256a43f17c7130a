// src/clients/linearClient.ts
import fetch, { type RequestInit, type Response } from "node-fetch";
import { UpstreamError } from "../utils/errors";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type Team = {
  id: string;
  name: string;
  key: string;
  description: string | null;
};

export type Ticket = {
  id: string;
  identifier: string;
  title: string;
  description: string | null;
  priority: number;
  state: string | null;
  teamId: string | null;
  assignee: { id: string; name: string } | null;
  labels: string[];
  url: string;
};

export type Member = {
  id: string;
  name: string;
  email: string | null;
  active: boolean;
};

type GraphqlError = { message: string; extensions?: Record<string, unknown> };

type GraphqlPayload<T> = {
  data?: T | null;
  errors?: GraphqlError[];
};

type TicketNode = {
  id: string;
  identifier: string;
  title: string;
  description?: string | null;
  priority: number;
  url: string;
  state?: { name: string } | null;
  team?: { id: string } | null;
  assignee?: { id: string; name: string } | null;
  labels?: { nodes: { name: string }[] } | null;
};

type RequestAuth = {
  apiKey?: string;
  signal?: AbortSignal;
};

const TICKET_FIELDS = `
  id
  identifier
  title
  description
  priority
  url
  state { name }
  team { id }
  assignee { id name }
  labels { nodes { name } }
`;

const MEMBER_FIELDS = "id name email active";

function parseJson<T>(text: string): T | undefined {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function mapTicket(node: TicketNode): Ticket {
  return {
    id: node.id,
    identifier: node.identifier,
    title: node.title,
    description: node.description ?? null,
    priority: node.priority,
    state: node.state?.name ?? null,
    teamId: node.team?.id ?? null,
    assignee: node.assignee ?? null,
    labels: node.labels?.nodes.map((label) => label.name) ?? [],
    url: node.url,
  };
}

export class LinearClient {
  constructor(
    private readonly endpoint: string,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  async listTeams(auth: RequestAuth): Promise<Team[]> {
    const data = await this.request<{ teams: { nodes: Team[] } }>(
      "query Teams { teams { nodes { id name key description } } }",
      {},
      auth
    );
    return data.teams.nodes.map((team) => ({ ...team, description: team.description ?? null }));
  }

  async listTickets(
    input: { teamId?: string; state?: string; first: number },
    auth: RequestAuth
  ): Promise<Ticket[]> {
    const filter: Record<string, unknown> = {};
    if (input.teamId) filter.team = { id: { eq: input.teamId } };
    if (input.state) filter.state = { name: { eqIgnoreCase: input.state } };

    const data = await this.request<{ issues: { nodes: TicketNode[] } }>(
      `query Tickets($filter: IssueFilter, $first: Int) {
        issues(filter: $filter, first: $first) { nodes { ${TICKET_FIELDS} } }
      }`,
      { filter, first: input.first },
      auth
    );
    return data.issues.nodes.map(mapTicket);
  }

  async getMember(lookup: { userId?: string; email?: string }, auth: RequestAuth): Promise<Member> {
    if (lookup.userId) {
      const data = await this.request<{ user: Member }>(
        `query Member($id: String!) { user(id: $id) { ${MEMBER_FIELDS} } }`,
        { id: lookup.userId },
        auth
      );
      return data.user;
    }

    if (lookup.email) {
      const data = await this.request<{ users: { nodes: Member[] } }>(
        `query MemberByEmail($email: String!) {
          users(filter: { email: { eq: $email } }) { nodes { ${MEMBER_FIELDS} } }
        }`,
        { email: lookup.email },
        auth
      );
      const [member] = data.users.nodes;
      if (!member) {
        throw new UpstreamError(`No Linear member with email ${lookup.email}`, { code: "not_found" });
      }
      return member;
    }

    const data = await this.request<{ viewer: Member }>(
      `query Viewer { viewer { ${MEMBER_FIELDS} } }`,
      {},
      auth
    );
    return data.viewer;
  }

  async createTicket(
    input: { teamId: string; title: string; description?: string; priority?: number },
    auth: RequestAuth
  ): Promise<Ticket> {
    const data = await this.request<{ issueCreate: { success: boolean; issue: TicketNode | null } }>(
      `mutation CreateTicket($input: IssueCreateInput!) {
        issueCreate(input: $input) { success issue { ${TICKET_FIELDS} } }
      }`,
      { input },
      auth
    );

    const { success, issue } = data.issueCreate;
    if (!success || !issue) {
      throw new UpstreamError("Linear did not create the ticket", { code: "rejected" });
    }
    return mapTicket(issue);
  }

  private async request<T>(
    query: string,
    variables: Record<string, unknown>,
    auth: RequestAuth
  ): Promise<T> {
    let res: Response;
    try {
      res = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          ...(auth.apiKey ? { Authorization: auth.apiKey } : {}),
        },
        body: JSON.stringify({ query, variables }),
        signal: auth.signal,
      });
    } catch (err) {
      if (err instanceof Error && err.name === "AbortError") {
        throw new UpstreamError("Linear request was cancelled", { code: "aborted", cause: err });
      }
      throw new UpstreamError(`Linear is unreachable: ${err instanceof Error ? err.message : String(err)}`, {
        code: "network_error",
        cause: err,
      });
    }

    const text = await res.text();
    const payload = parseJson<GraphqlPayload<T>>(text);

    if (!res.ok) {
      const message = payload?.errors?.[0]?.message ?? (text || res.statusText);
      throw new UpstreamError(`Linear API responded ${res.status}: ${message}`, {
        status: res.status,
        code: res.status === 429 ? "rate_limited" : "http_error",
        detail: payload?.errors ?? text,
      });
    }

    if (payload?.errors && payload.errors.length > 0) {
      throw new UpstreamError(
        `Linear GraphQL error: ${payload.errors.map((e) => e.message).join("; ")}`,
        { status: res.status, code: "graphql_error", detail: payload.errors }
      );
    }

    if (!payload?.data) {
      throw new UpstreamError("Linear API returned no data", {
        status: res.status,
        code: "empty_response",
      });
    }
    return payload.data;
  }
}
