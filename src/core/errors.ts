/**
 * Error taxonomy shared by the core and the front ends.
 *
 * Only ValidationError and NotInitializedError reach request handlers;
 * ConnectivityError and NoModelError abort start-up; GenerationEndpointError
 * is turned into a per-document placeholder by the orchestrator.
 */

export class ValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [message]) {
    super(message);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class NotInitializedError extends Error {
  constructor(service: string) {
    super(`${service} not connected. Call initialize() first.`);
    this.name = "NotInitializedError";
  }
}

export class ConnectivityError extends Error {
  readonly baseUrl: string;

  constructor(baseUrl: string, detail: string) {
    super(`Cannot connect to model server at ${baseUrl}: ${detail}`);
    this.name = "ConnectivityError";
    this.baseUrl = baseUrl;
  }
}

export class NoModelError extends Error {
  constructor(baseUrl: string) {
    super(`No models loaded on model server at ${baseUrl}`);
    this.name = "NoModelError";
  }
}

export class GenerationEndpointError extends Error {
  readonly status: number;
  readonly body: string;

  constructor(status: number, body: string) {
    super(`Model server API error: ${status}${body ? ` ${body}` : ""}`);
    this.name = "GenerationEndpointError";
    this.status = status;
    this.body = body;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : "Unknown error";
}
