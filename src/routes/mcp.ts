/**
 * MCP (Model Context Protocol) HTTP endpoint, so agents can call the travel
 * API as tools.
 *
 * Routes:
 *   POST /mcp - JSON-RPC 2.0 endpoint for the MCP protocol
 *   GET  /mcp - tool discovery
 */

import { Router, type Request, type Response } from "express";
import { ServiceError } from "../errors.js";
import { isRecord } from "../json-fields.js";
import type { TravelServices } from "../services.js";

const SERVER_NAME = "travel-aggregator-mcp";
const SERVER_VERSION = "1.0.0";
const PROTOCOL_VERSION = "2024-11-05";

// --- Tool Definitions ---

const TOOLS = [
  {
    name: "list_destinations",
    description: "List popular travel destinations with capital, region, population, currencies and languages.",
    inputSchema: {
      type: "object",
      properties: {},
      required: []
    }
  },
  {
    name: "get_destination",
    description: "Get country details for an ISO country code such as JP or FR.",
    inputSchema: {
      type: "object",
      properties: {
        country_code: { type: "string", description: "ISO 3166 alpha-2 or alpha-3 country code" }
      },
      required: ["country_code"]
    }
  },
  {
    name: "search_destination",
    description: "Find the country code for a country name.",
    inputSchema: {
      type: "object",
      properties: {
        country: { type: "string", description: "Country name, full or partial" }
      },
      required: ["country"]
    }
  },
  {
    name: "get_travel_summary",
    description: "Get country details, current weather at the capital, travel tips and the best time to visit, by country code.",
    inputSchema: {
      type: "object",
      properties: {
        country_code: { type: "string", description: "ISO country code, e.g. JP" }
      },
      required: ["country_code"]
    }
  },
  {
    name: "get_travel_summary_by_name",
    description: "Same as get_travel_summary, looked up by country name among the popular destinations.",
    inputSchema: {
      type: "object",
      properties: {
        country_name: { type: "string", description: "Country name, e.g. Japan" }
      },
      required: ["country_name"]
    }
  }
] as const;

type ToolName = (typeof TOOLS)[number]["name"];

// --- MCP Protocol Handler ---

type JsonRpcId = string | number | null;

interface JsonRpcRequest {
  jsonrpc: "2.0";
  id: JsonRpcId;
  method: string;
  params?: unknown;
}

interface JsonRpcResponse {
  jsonrpc: "2.0";
  id: JsonRpcId;
  result?: unknown;
  error?: { code: number; message: string };
}

interface ToolResult {
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

const METHOD_NOT_FOUND = -32601;
const INVALID_PARAMS = -32602;
const INVALID_REQUEST = -32600;
const INTERNAL_ERROR = -32603;

class InvalidParamsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidParamsError";
  }
}

class UnknownToolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UnknownToolError";
  }
}

function isToolName(name: string): name is ToolName {
  return TOOLS.some((tool) => tool.name === name);
}

function readArgument(args: unknown, key: string): string {
  const value = isRecord(args) ? args[key] : undefined;
  if (typeof value !== "string" || !value.trim()) {
    throw new InvalidParamsError(`Missing required argument: ${key}`);
  }
  return value;
}

async function callTool(services: TravelServices, name: ToolName, args: unknown): Promise<unknown> {
  switch (name) {
    case "list_destinations":
      return { destinations: await services.directory.listPopular() };
    case "get_destination":
      return services.directory.getByCode(readArgument(args, "country_code"));
    case "search_destination":
      return services.directory.searchByName(readArgument(args, "country"));
    case "get_travel_summary":
      return services.summaries.summaryByCode(readArgument(args, "country_code"));
    case "get_travel_summary_by_name":
      return services.summaries.summaryByName(readArgument(args, "country_name"));
  }
}

async function handleToolCall(services: TravelServices, params: unknown): Promise<ToolResult> {
  const name = isRecord(params) ? params.name : undefined;
  if (typeof name !== "string" || !isToolName(name)) {
    throw new UnknownToolError(`Unknown tool: ${String(name)}`);
  }

  try {
    const result = await callTool(services, name, isRecord(params) ? params.arguments : undefined);
    return { content: [{ type: "text", text: JSON.stringify(result, null, 2) }] };
  } catch (error) {
    // Domain failures are tool output the agent can read, not protocol errors.
    if (error instanceof ServiceError) {
      return { content: [{ type: "text", text: error.message }], isError: true };
    }
    throw error;
  }
}

export async function handleMcpRequest(services: TravelServices, req: JsonRpcRequest): Promise<JsonRpcResponse> {
  const { id, method, params } = req;

  try {
    switch (method) {
      case "initialize":
        return {
          jsonrpc: "2.0",
          id,
          result: {
            protocolVersion: PROTOCOL_VERSION,
            capabilities: { tools: {} },
            serverInfo: { name: SERVER_NAME, version: SERVER_VERSION },
            instructions: "Travel data aggregator. Use these tools when the user asks about a country as a travel destination: country facts, current weather at the capital, packing and travel tips, or when to visit."
          }
        };

      case "tools/list":
        return { jsonrpc: "2.0", id, result: { tools: TOOLS } };

      case "tools/call":
        return { jsonrpc: "2.0", id, result: await handleToolCall(services, params) };

      case "ping":
        return { jsonrpc: "2.0", id, result: {} };

      default:
        return { jsonrpc: "2.0", id, error: { code: METHOD_NOT_FOUND, message: `Unknown method: ${method}` } };
    }
  } catch (err) {
    if (err instanceof UnknownToolError) {
      return { jsonrpc: "2.0", id, error: { code: METHOD_NOT_FOUND, message: err.message } };
    }
    if (err instanceof InvalidParamsError) {
      return { jsonrpc: "2.0", id, error: { code: INVALID_PARAMS, message: err.message } };
    }
    console.error(`[MCP] ${method} failed`, err);
    const message = err instanceof Error ? err.message : "Internal error";
    return { jsonrpc: "2.0", id, error: { code: INTERNAL_ERROR, message } };
  }
}

function parseJsonRpcRequest(body: unknown): JsonRpcRequest | null {
  if (!isRecord(body) || body.jsonrpc !== "2.0" || typeof body.method !== "string") {
    return null;
  }
  const id = body.id;
  const validId = typeof id === "string" || typeof id === "number" ? id : null;
  return { jsonrpc: "2.0", id: validId, method: body.method, params: body.params };
}

// --- Express Router ---

export function createMcpRouter(services: TravelServices): Router {
  const router = Router();

  router.post("/", async (req: Request, res: Response) => {
    const request = parseJsonRpcRequest(req.body);

    if (!request) {
      res.status(400).json({
        jsonrpc: "2.0",
        id: null,
        error: { code: INVALID_REQUEST, message: "Invalid JSON-RPC request" }
      });
      return;
    }

    console.log(`[MCP] ${request.method}`, request.params ? JSON.stringify(request.params) : "");

    res.json(await handleMcpRequest(services, request));
  });

  router.get("/", (_req: Request, res: Response) => {
    res.json({
      name: SERVER_NAME,
      version: SERVER_VERSION,
      description: "MCP server for travel destination data",
      tools: TOOLS.map((t) => ({ name: t.name, description: t.description }))
    });
  });

  return router;
}
