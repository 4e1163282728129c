// src/server/error_map.ts
import { z } from "zod";
import { QueryExecutionError, UnknownSessionError } from "../atlas/errors.js";

export interface HttpFailure {
  status: number;
  body: { error: string; retryable?: boolean };
}

export interface RpcFailure {
  code: number;
  message: string;
  data?: { retryable: boolean };
}

export const RPC_INVALID_PARAMS = -32602;
export const RPC_UNKNOWN_SESSION = -32001;
export const RPC_STORE_FAULT = -32002;
export const RPC_INTERNAL = -32603;

function messageOf(e: unknown): string {
  if (e instanceof z.ZodError) return e.issues.map(issue => issue.message).join("; ");
  if (e instanceof Error) return e.message;
  return "Internal error";
}

export function toHttpFailure(e: unknown): HttpFailure {
  const error = messageOf(e);
  if (e instanceof z.ZodError) return { status: 400, body: { error } };
  if (e instanceof UnknownSessionError) return { status: 404, body: { error } };
  if (e instanceof QueryExecutionError) return { status: 503, body: { error, retryable: true } };
  return { status: 500, body: { error } };
}

export function toRpcFailure(e: unknown): RpcFailure {
  const message = messageOf(e);
  if (e instanceof z.ZodError) return { code: RPC_INVALID_PARAMS, message };
  if (e instanceof UnknownSessionError) return { code: RPC_UNKNOWN_SESSION, message };
  if (e instanceof QueryExecutionError) return { code: RPC_STORE_FAULT, message, data: { retryable: true } };
  return { code: RPC_INTERNAL, message };
}
