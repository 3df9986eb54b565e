import {
  JSON_RPC_ERRORS,
  JsonRpcRequest,
  type JsonRpcId,
  type JsonRpcResponse,
  type ToolCallResult,
  ToolCallParams,
} from "@lib/contracts/rpc/jsonrpc";

import {
  PROTOCOL_VERSION,
  SERVER_INFO,
  type RpcHandlerContext,
  type ToolDefinition,
} from "./context";
import { createTarotTools } from "./tools";
import { isErrorResponse, serializeForLog } from "./utils";

function success(id: JsonRpcId | null, result: unknown): JsonRpcResponse {
  return { jsonrpc: "2.0", id, result };
}

function failure(
  id: JsonRpcId | null,
  code: number,
  message: string,
): JsonRpcResponse {
  return { jsonrpc: "2.0", id, error: { code, message } };
}

function describeTools(tools: ToolDefinition[]) {
  return tools.map(({ name, description, inputSchema }) => ({
    name,
    description,
    inputSchema,
  }));
}

/**
 * Handles one JSON-RPC 2.0 request. Returns undefined for notifications,
 * which get no reply.
 */
export async function dispatchJsonRpc(
  ctx: RpcHandlerContext,
  payload: unknown,
  tools: ToolDefinition[] = createTarotTools(),
): Promise<JsonRpcResponse | undefined> {
  const parsed = JsonRpcRequest.safeParse(payload);
  if (!parsed.success) {
    ctx.logger.warn(
      { payload: serializeForLog(payload) },
      "[rpc] invalid request",
    );
    return failure(
      null,
      JSON_RPC_ERRORS.INVALID_REQUEST,
      "Invalid JSON-RPC request",
    );
  }

  const { id, method, params } = parsed.data;
  if (id === undefined) {
    ctx.logger.info({ method }, "[rpc] notification");
    return undefined;
  }

  switch (method) {
    case "initialize":
      return success(id, {
        protocolVersion: PROTOCOL_VERSION,
        serverInfo: SERVER_INFO,
        capabilities: { tools: {} },
      });
    case "ping":
      return success(id, {});
    case "tools/list":
      return success(id, { tools: describeTools(tools) });
    case "tools/call":
      return callTool(ctx, id, params, tools);
    default:
      return failure(
        id,
        JSON_RPC_ERRORS.METHOD_NOT_FOUND,
        `Method not found: ${method}`,
      );
  }
}

async function callTool(
  ctx: RpcHandlerContext,
  id: JsonRpcId,
  params: unknown,
  tools: ToolDefinition[],
): Promise<JsonRpcResponse> {
  const parsed = ToolCallParams.safeParse(params ?? {});
  if (!parsed.success) {
    return failure(id, JSON_RPC_ERRORS.INVALID_PARAMS, parsed.error.message);
  }

  const { name, arguments: args } = parsed.data;
  const tool = tools.find((candidate) => candidate.name === name);
  if (!tool) {
    return failure(id, JSON_RPC_ERRORS.INVALID_PARAMS, `Unknown tool: ${name}`);
  }

  const argsPreview = serializeForLog(args);
  ctx.logger.info(
    argsPreview !== undefined ? { tool: name, args: argsPreview } : { tool: name },
    `[rpc:${name}] received`,
  );

  try {
    const response = await tool.handler(ctx, args);
    const responsePreview = serializeForLog(response.body);
    if (isErrorResponse(response.body)) {
      ctx.logger.warn(
        { tool: name, status: response.status, response: responsePreview },
        `[rpc:${name}] responding with error`,
      );
    } else {
      ctx.logger.info(
        { tool: name, response: responsePreview },
        `[rpc:${name}] responding`,
      );
    }

    const result: ToolCallResult = {
      content: [{ type: "text", text: JSON.stringify(response.body) }],
    };
    if (response.status >= 400) result.isError = true;
    return success(id, result);
  } catch (err: unknown) {
    ctx.logger.error({ err, tool: name }, `[rpc:${name}] handler threw`);
    return failure(
      id,
      JSON_RPC_ERRORS.INTERNAL_ERROR,
      err instanceof Error ? err.message : "Unexpected error",
    );
  }
}
