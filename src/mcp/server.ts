/**
 * vuln-risk: MCP Server
 *
 * Exposes the app's tools over stdio to any MCP client.
 *
 * Tools:
 *   risk_enrich          Pipeline: enrich, score and prioritize findings
 *   risk_summarize       Risk layer: count findings per priority tier
 *   risk_kev_lookup      KEV layer: CISA catalog membership
 *   risk_epss_scores     EPSS layer: exploitation probabilities
 *   risk_ghsa_lookup     GHSA layer: advisory and patched versions
 *   risk_exploit_lookup  Exploit layer: VulnCheck weaponization status
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { CallToolRequestSchema, ListToolsRequestSchema } from "@modelcontextprotocol/sdk/types.js";
import { errorMessage } from "../errors.js";
import type { RiskApp } from "../app.js";

export function createServer(app: RiskApp): Server {
  const server = new Server(
    { name: app.name, version: app.version },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: app.tools.map((t) => ({ name: t.name, description: t.description, inputSchema: t.inputSchema })),
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const tool = app.tools.find((t) => t.name === request.params.name);
    if (!tool) {
      return { content: [{ type: "text", text: `Unknown tool: ${request.params.name}` }], isError: true };
    }
    try {
      const text = await tool.execute(request.params.arguments ?? {});
      return { content: [{ type: "text", text }] };
    } catch (err) {
      console.error(`[vuln-risk:mcp] ${tool.name} failed: ${errorMessage(err)}`);
      return { content: [{ type: "text", text: `Error: ${errorMessage(err)}` }], isError: true };
    }
  });

  return server;
}

export async function startServer(app: RiskApp): Promise<void> {
  const server = createServer(app);
  await server.connect(new StdioServerTransport());
  console.error(`[vuln-risk:mcp] ${app.name} ${app.version} serving ${app.tools.length} tools on stdio`);
}
