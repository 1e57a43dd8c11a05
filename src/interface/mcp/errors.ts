/**
 * MCP error code definitions and error conversion
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import {
  CheckpointUnavailableError,
  CitegraphError,
  CorruptDataError,
  DatabaseError,
  InvalidInputError,
  NodeNotFoundError,
  RunNotFoundError,
} from '../../shared/errors.js';

export const CITEGRAPH_ERROR = {
  NODE_NOT_FOUND: -32001,
  RUN_NOT_FOUND: -32002,
  DATABASE_ERROR: -32003,
  CHECKPOINT_UNAVAILABLE: -32004,
  CORRUPT_DATA: -32005,
} as const;

export function toMcpError(error: unknown): McpError {
  if (error instanceof McpError) {
    return error;
  }

  if (error instanceof NodeNotFoundError) {
    return new McpError(CITEGRAPH_ERROR.NODE_NOT_FOUND, error.message);
  }

  if (error instanceof RunNotFoundError) {
    return new McpError(CITEGRAPH_ERROR.RUN_NOT_FOUND, error.message);
  }

  if (error instanceof CheckpointUnavailableError) {
    return new McpError(
      CITEGRAPH_ERROR.CHECKPOINT_UNAVAILABLE,
      `${error.message} Run 'citegraph init' in the served directory.`,
    );
  }

  if (error instanceof DatabaseError) {
    return new McpError(CITEGRAPH_ERROR.DATABASE_ERROR, `Database error: ${error.message}`);
  }

  if (error instanceof CorruptDataError) {
    return new McpError(CITEGRAPH_ERROR.CORRUPT_DATA, error.message);
  }

  if (error instanceof InvalidInputError) {
    return new McpError(ErrorCode.InvalidParams, error.message);
  }

  if (error instanceof CitegraphError) {
    return new McpError(ErrorCode.InternalError, error.message);
  }

  return new McpError(
    ErrorCode.InternalError,
    error instanceof Error ? error.message : 'Unknown error',
  );
}
