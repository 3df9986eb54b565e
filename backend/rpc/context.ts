import { HTTP_STATUS_FOR, type ApiErrorCode } from "@lib/common/errors";
import type { ToolDescriptor } from "@lib/contracts/rpc/jsonrpc";
import type { DrawEngine } from "@server/draw/engine";
import type { HandlerResponse } from "@server/http/handlers";
import type { Logger } from "@server/logger";

export const PROTOCOL_VERSION = "2024-11-05";
export const SERVER_INFO = { name: "tarot-draw", version: "1.0.0" };

export type RpcHandlerContext = {
  engine: DrawEngine;
  logger: Logger;
};

export type ToolDefinition = ToolDescriptor & {
  handler: (
    ctx: RpcHandlerContext,
    args: unknown,
  ) => Promise<HandlerResponse<unknown>> | HandlerResponse<unknown>;
};

export type ErrorShape = { error: { code: ApiErrorCode; message: string } };

export function validationError(message: string): HandlerResponse<ErrorShape> {
  return {
    status: HTTP_STATUS_FOR.VALIDATION,
    body: { error: { code: "VALIDATION", message } },
  };
}
