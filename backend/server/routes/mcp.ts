import type { FastifyError, FastifyInstance } from "fastify";
import { JSON_RPC_ERRORS, type JsonRpcResponse } from "@lib/contracts/rpc/jsonrpc";
import type { DrawEngine } from "@server/draw/engine";
import { dispatchJsonRpc } from "../../rpc/dispatch";

// the JSON parser rethrows SyntaxError; other parser failures carry FST_ERR_CTP_*
function isBodyParseError(err: FastifyError): boolean {
  if (err instanceof SyntaxError) return true;
  return typeof err.code === "string" && err.code.startsWith("FST_ERR_CTP_");
}

export function registerMcpRoute(app: FastifyInstance, engine: DrawEngine) {
  app.post(
    "/mcp",
    {
      errorHandler(err: FastifyError, request, reply) {
        if (isBodyParseError(err)) {
          return reply.status(400).send({
            jsonrpc: "2.0",
            id: null,
            error: { code: JSON_RPC_ERRORS.PARSE_ERROR, message: "Parse error" },
          } satisfies JsonRpcResponse);
        }
        request.log.error({ err }, "Unhandled JSON-RPC error");
        return reply.status(500).send({
          jsonrpc: "2.0",
          id: null,
          error: { code: JSON_RPC_ERRORS.INTERNAL_ERROR, message: "Internal error" },
        } satisfies JsonRpcResponse);
      },
    },
    async (request, reply) => {
      const response = await dispatchJsonRpc(
        { engine, logger: request.log },
        request.body,
      );
      if (!response) return reply.status(202).send();
      return reply.status(200).send(response);
    },
  );
}
