// src/clients/mcpClient.ts
import axios, { type AxiosInstance } from "axios";
import type { ResultEnvelope, ServiceSummary, ToolSummary } from "../types/mcp";

/**
 * Thin client for the gateway's HTTP surface. Execution calls resolve with the
 * envelope whatever the status code; listing calls throw on non-2xx.
 */
export class McpClient {
  private readonly http: AxiosInstance;

  constructor(baseUrl = "http://localhost:3000") {
    this.http = axios.create({ baseURL: baseUrl });
  }

  async listServices(): Promise<ServiceSummary[]> {
    const res = await this.http.get<ServiceSummary[]>("/services");
    return res.data;
  }

  async listTools(serviceId?: string): Promise<ToolSummary[]> {
    const res = await this.http.get<ToolSummary[]>("/tools", {
      params: serviceId === undefined ? undefined : { service: serviceId },
    });
    return res.data;
  }

  // routing is left entirely to the gateway
  async executeTool(toolName: string, params: Record<string, unknown> = {}): Promise<ResultEnvelope> {
    const res = await this.http.post<ResultEnvelope>(
      "/execute",
      { tool_name: toolName, params },
      { validateStatus: () => true }
    );
    return res.data;
  }

  async executeServiceTool(
    serviceId: string,
    toolName: string,
    params: Record<string, unknown> = {}
  ): Promise<ResultEnvelope> {
    const res = await this.http.post<ResultEnvelope>(
      `/${encodeURIComponent(serviceId)}/${encodeURIComponent(toolName)}`,
      params,
      { validateStatus: () => true }
    );
    return res.data;
  }
}
