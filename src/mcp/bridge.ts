import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";

import type { CoreHost } from "../host/coreHost.js";
import type { CoreResponse } from "../rpc/contracts.js";

export const MCP_SERVER_NAME = "lanekeeper";

export interface CoreMcpServerOptions {
  /** Session every tool call is forwarded under, e.g. `task:T-12`. */
  sessionId: string;
  /** Version of the MCP client package; checked against the core version. */
  clientVersion?: string;
  profile?: string;
}

function j(value: unknown): string {
  return JSON.stringify(value, null, 2);
}

function toolName(call: string): string {
  return call.replace(".", "_");
}

function structured(response: CoreResponse): Record<string, unknown> {
  return response.ok
    ? { ok: true, request_id: response.requestId, result: response.result ?? null }
    : { ok: false, request_id: response.requestId, error: response.error ?? null };
}

/**
 * Exposes every dispatchable `capability.method` pair as an MCP tool named
 * `capability_method`. Calls are forwarded to the host on the `kagan` lane,
 * so binding, authorization and the version check apply unchanged.
 */
export function createCoreMcpServer(host: CoreHost, options: CoreMcpServerOptions): McpServer {
  const server = new McpServer({ name: MCP_SERVER_NAME, version: host.services.settings.coreVersion });

  for (const handler of host.listHandlers()) {
    const [capability, method] = handler.call.split(".");
    server.registerTool(
      toolName(handler.call),
      {
        title: handler.call,
        description: handler.description,
        inputSchema: handler.shape,
      },
      async (input: Record<string, unknown>, extra) => {
        const response = await host.handleRequest(
          {
            sessionId: options.sessionId,
            sessionProfile: options.profile,
            sessionOrigin: "kagan",
            clientVersion: options.clientVersion,
            capability,
            method,
            params: input,
          },
          { signal: extra.signal },
        );
        const payload = structured(response);
        return {
          content: [{ type: "text" as const, text: j(payload) }],
          structuredContent: payload,
          ...(response.ok ? {} : { isError: true }),
        };
      },
    );
  }

  return server;
}
