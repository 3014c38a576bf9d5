import type { z } from "zod";

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** One line per issue, `path: message`, joined with "; ". */
export function formatZodError(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

const MAX_BODY_IN_MESSAGE = 500;

/** Jira answered with a non-2xx status. */
export class JiraApiError extends Error {
  readonly status: number;
  readonly statusText: string;
  readonly method: string;
  readonly path: string;
  readonly body: string;

  constructor(params: { method: string; path: string; status: number; statusText: string; body: string }) {
    const base = `${params.method} ${params.path} failed with ${params.status} ${params.statusText}`.trimEnd();
    const detail = params.body.trim();
    super(detail ? `${base}: ${detail.slice(0, MAX_BODY_IN_MESSAGE)}` : base);
    this.name = "JiraApiError";
    this.status = params.status;
    this.statusText = params.statusText;
    this.method = params.method;
    this.path = params.path;
    this.body = params.body;
  }
}

/** The request never produced a response: connection failure, DNS, timeout. */
export class JiraTransportError extends Error {
  readonly method: string;
  readonly path: string;

  constructor(method: string, path: string, cause: unknown) {
    super(`${method} ${path} request failed: ${getErrorMessage(cause)}`, { cause });
    this.name = "JiraTransportError";
    this.method = method;
    this.path = path;
  }
}
