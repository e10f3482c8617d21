/* eslint-disable no-redeclare */
import { TaggedError } from "better-result";

// Topology size out of range or not an integer
export const InvalidParameterError = TaggedError("InvalidParameterError")<{
  message: string;
  parameter: string;
}>();

export type InvalidParameterError = InstanceType<typeof InvalidParameterError>;

// Lifecycle errors
export const AlreadyRunningError = TaggedError("AlreadyRunningError")<{
  message: string;
}>();

export type AlreadyRunningError = InstanceType<typeof AlreadyRunningError>;

export const NotRunningError = TaggedError("NotRunningError")<{
  message: string;
}>();

export type NotRunningError = InstanceType<typeof NotRunningError>;

// Unknown node in the live topology
export const NodeNotFoundError = TaggedError("NodeNotFoundError")<{
  message: string;
  node: string;
}>();

export type NodeNotFoundError = InstanceType<typeof NodeNotFoundError>;

// Emulation fabric or configuration step failures
export const FabricError = TaggedError("FabricError")<{
  message: string;
  command?: string;
  exitCode?: number;
  stderr?: string;
  cause?: unknown;
}>();

export type FabricError = InstanceType<typeof FabricError>;

// No handler for path + method
export const RouteNotFoundError = TaggedError("RouteNotFoundError")<{
  message: string;
  path: string;
  method: string;
}>();

export type RouteNotFoundError = InstanceType<typeof RouteNotFoundError>;

// Configuration errors
export const ValidationError = TaggedError("ValidationError")<{
  message: string;
}>();

export type ValidationError = InstanceType<typeof ValidationError>;

// Union type for all pathmesh errors
export type PathmeshError =
  | InvalidParameterError
  | AlreadyRunningError
  | NotRunningError
  | NodeNotFoundError
  | FabricError
  | RouteNotFoundError
  | ValidationError;

/**
 * Get HTTP status code for an error
 */
export function getHttpStatus(error: PathmeshError): number {
  switch (error._tag) {
    case "InvalidParameterError":
    case "AlreadyRunningError":
    case "NotRunningError":
    case "ValidationError":
      return 400;
    case "NodeNotFoundError":
    case "RouteNotFoundError":
      return 404;
    case "FabricError":
    default:
      return 500;
  }
}

/**
 * Build the JSON body for an error response. Client errors carry a
 * `message`, everything else an `error`.
 */
export function toErrorBody(status: number, message: string): { message: string } | { error: string } {
  return status === 400 ? { message } : { error: message };
}
