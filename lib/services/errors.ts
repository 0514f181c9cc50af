import type { ScreenError } from "@/lib/models";

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

export class MalformedInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedInputError";
  }
}

export class OversizedUnsplittableScreenError extends Error {
  rootId: string;
  nodeCount: number;
  depth: number;

  constructor(rootId: string, nodeCount: number, depth: number) {
    super(`Subtree ${rootId} (${nodeCount} nodes) still exceeds screen capacity after ${depth} split levels`);
    this.name = "OversizedUnsplittableScreenError";
    this.rootId = rootId;
    this.nodeCount = nodeCount;
    this.depth = depth;
  }
}

export class ScreenTooDeepError extends OversizedUnsplittableScreenError {
  height: number;

  constructor(rootId: string, nodeCount: number, depth: number, height: number, maxNesting: number) {
    super(rootId, nodeCount, depth);
    this.message = `Subtree ${rootId} nests ${height} levels deep; screens allow at most ${maxNesting}`;
    this.name = "ScreenTooDeepError";
    this.height = height;
  }
}

export type TransientReason = "timeout" | "rate_limit" | "server" | "network";

export class TransientOracleError extends Error {
  reason: TransientReason;
  status?: number;

  constructor(reason: TransientReason, message: string, status?: number) {
    super(message);
    this.name = "TransientOracleError";
    this.reason = reason;
    this.status = status;
  }
}

export class OracleRequestError extends Error {
  status?: number;

  constructor(message: string, status?: number) {
    super(message);
    this.name = "OracleRequestError";
    this.status = status;
  }
}

export class ParseError extends Error {
  preview: string;

  constructor(message: string, raw: string) {
    super(message);
    this.name = "ParseError";
    this.preview = raw.slice(0, 200);
  }
}

export class UnknownComponentReferenceError extends Error {
  componentName: string;

  constructor(componentName: string) {
    super(`Oracle referenced unknown component "${componentName}"`);
    this.name = "UnknownComponentReferenceError";
    this.componentName = componentName;
  }
}

export class InvalidScreenTransitionError extends Error {
  constructor(screenId: string, from: string, to: string) {
    super(`Screen ${screenId} cannot move from ${from} to ${to}`);
    this.name = "InvalidScreenTransitionError";
  }
}

export function isTransientOracleError(error: unknown): boolean {
  if (error instanceof TransientOracleError) return true;
  // Aborted fetches surface as DOMExceptions rather than our own classes
  return error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError");
}

export function describeScreenError(error: unknown): ScreenError {
  if (error instanceof OversizedUnsplittableScreenError) {
    return { kind: "oversized_unsplittable", message: error.message };
  }
  if (isTransientOracleError(error)) {
    return { kind: "transient_oracle", message: errorMessage(error) };
  }
  if (error instanceof OracleRequestError) {
    return { kind: "oracle_request", message: error.message };
  }
  if (error instanceof ParseError) {
    return { kind: "parse", message: error.message };
  }
  if (error instanceof UnknownComponentReferenceError) {
    return { kind: "unknown_component", message: error.message };
  }
  return { kind: "unexpected", message: errorMessage(error) };
}
