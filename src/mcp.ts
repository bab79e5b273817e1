/**
 * MCP server — exposes domain detection and requirements analysis tools.
 *
 * Tools: domain_detect, domain_extract, domain_ensure, domain_suggest,
 *        pipeline_run, domain_list
 */

import { Server } from "@modelcontextprotocol/sdk/server/index.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
} from "@modelcontextprotocol/sdk/types.js";
import { createContainer, type Container } from "./container.ts";
import { messageOf } from "./domain/errors.ts";
import { detectQuery } from "./application/queries/detect-query.ts";
import { extractQuery } from "./application/queries/extract-query.ts";
import { domainsQuery } from "./application/queries/domains-query.ts";
import { runPipeline } from "./application/commands/run-pipeline.ts";
import { analyzeContent } from "./application/plugins/content-analysis.ts";
import { parseDocument } from "./infra/document-parser.ts";
import { renderApprovalXml } from "./infra/xml-renderer.ts";
import { getLogger } from "./logger.ts";

let container: Container | null = null;

async function getContainer(): Promise<Container> {
  if (!container) {
    container = await createContainer();
  }
  return container;
}

const textInput = {
  text: { type: "string", description: "Requirements document text (markdown, frontmatter allowed)" },
};

const server = new Server(
  { name: "domainkit", version: "1.0.0" },
  { capabilities: { tools: {} } },
);

server.setRequestHandler(ListToolsRequestSchema, async () => ({
  tools: [
    {
      name: "domain_detect",
      description: "Detect the business domain of a document. Returns the best match, the runner-up and ranked candidates.",
      inputSchema: {
        type: "object" as const,
        properties: {
          ...textInput,
          limit: { type: "number", description: "Max candidates (default: 5)" },
        },
        required: ["text"],
      },
    },
    {
      name: "domain_extract",
      description: "Extract requirements and stakeholders with a named or detected domain handler.",
      inputSchema: {
        type: "object" as const,
        properties: {
          ...textInput,
          domain: { type: "string", description: "Domain name (default: detected)" },
          cross_cutting: { type: "boolean", description: "Include security, reliability and real-time requirements (default: true)" },
        },
        required: ["text"],
      },
    },
    {
      name: "domain_ensure",
      description: "Reuse a handler above the confidence threshold or generate, validate and register a new one.",
      inputSchema: {
        type: "object" as const,
        properties: textInput,
        required: ["text"],
      },
    },
    {
      name: "domain_suggest",
      description: "Offline content analysis: key terms, stakeholders, cross-cutting concerns and a suggested handler spec.",
      inputSchema: {
        type: "object" as const,
        properties: textInput,
        required: ["text"],
      },
    },
    {
      name: "pipeline_run",
      description: "Run analyze → requirements → tasks → approval over a document.",
      inputSchema: {
        type: "object" as const,
        properties: {
          ...textInput,
          format: { type: "string", description: "json (default) or xml (approval element only)" },
        },
        required: ["text"],
      },
    },
    {
      name: "domain_list",
      description: "List registered domain handlers in registration order.",
      inputSchema: { type: "object" as const, properties: {} },
    },
  ],
}));

server.setRequestHandler(CallToolRequestSchema, async (request, extra) => {
  const { name, arguments: args } = request.params;

  try {
    const c = await getContainer();
    const text = parseDocument(String(args?.text ?? "")).text;

    switch (name) {
      case "domain_detect": {
        const result = detectQuery({ text, limit: Number(args?.limit ?? 5) }, c.registry);
        return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
      }

      case "domain_extract": {
        const result = extractQuery(
          {
            text,
            domain: args?.domain ? String(args.domain) : null,
            crossCutting: args?.cross_cutting !== false,
          },
          c.registry,
        );
        return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
      }

      case "domain_ensure": {
        const result = await c.creator.ensureHandler(text, { signal: extra.signal });
        return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
      }

      case "domain_suggest": {
        const result = analyzeContent(text);
        return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
      }

      case "pipeline_run": {
        const result = await runPipeline(text, {
          registry: c.registry,
          creator: c.creator,
          minRequirements: c.config.minRequirements,
          signal: extra.signal,
        });
        const body = args?.format === "xml" ? renderApprovalXml(result) : JSON.stringify(result, null, 2);
        return { content: [{ type: "text", text: body }] };
      }

      case "domain_list": {
        const result = domainsQuery(c.registry);
        return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
      }

      default:
        return { content: [{ type: "text", text: `Unknown tool: ${name}` }], isError: true };
    }
  } catch (error) {
    getLogger("mcp").error({ err: error, tool: name }, "tool call failed");
    return { content: [{ type: "text", text: `Error: ${messageOf(error)}` }], isError: true };
  }
});

const transport = new StdioServerTransport();
await server.connect(transport);
