// src/tools/tool_context.ts
import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { logger } from '../utils/logger.js';
import { AppError, NotFoundError, ValidationError, errorMessage } from '../utils/errors.js';
import { storageCall } from '../utils/async.js';
import { type TaskStore } from '../types/index.js';
import { type ChatTurnService } from '../services/ChatTurnService.js';

/**
 * Everything a tool handler needs. Built once by createAppContext and shared
 * by every registered tool.
 */
export interface ToolContext {
  tasks: TaskStore;
  chat: ChatTurnService;
  storageTimeoutMs: number;
}

export interface ToolResult {
  [key: string]: unknown;
  content: { type: 'text'; text: string }[];
}

export function jsonResult(value: unknown): ToolResult {
  return { content: [{ type: 'text' as const, text: JSON.stringify(value) }] };
}

/** Idempotent adapter call for direct tool invocations. */
export function readTasks<T>(context: ToolContext, call: () => Promise<T>): Promise<T> {
  return storageCall(call, { timeoutMs: context.storageTimeoutMs, idempotent: true });
}

/** Mutating adapter call for direct tool invocations; never retried. */
export function writeTasks<T>(context: ToolContext, call: () => Promise<T>): Promise<T> {
  return storageCall(call, { timeoutMs: context.storageTimeoutMs, idempotent: false });
}

export function toMcpError(toolName: string, error: unknown): McpError {
  if (error instanceof McpError) return error;
  if (error instanceof NotFoundError || error instanceof ValidationError) {
    logger.warn(`[${toolName}] ${error.message}`);
    return new McpError(ErrorCode.InvalidParams, error.message);
  }
  logger.error({ err: error }, `[${toolName}] Error processing request`);
  const code = error instanceof AppError ? error.errorCode : 'Unknown';
  return new McpError(ErrorCode.InternalError, `${code}: ${errorMessage(error)}`);
}
