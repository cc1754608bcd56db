/**
 * Standardized API error responses.
 */
import { FastifyReply } from "fastify";
import type { ZodError } from "zod";

export interface ApiError {
  error: string;
  message: string;
  statusCode: number;
}

export function sendError(reply: FastifyReply, statusCode: number, error: string, message?: string): ApiError {
  const body: ApiError = { error, message: message || error, statusCode };
  reply.code(statusCode);
  return body;
}

export function send400(reply: FastifyReply, error: string, message?: string) {
  return sendError(reply, 400, error, message);
}
export function send404(reply: FastifyReply, error: string, message?: string) {
  return sendError(reply, 404, error, message);
}

/** Domain error codes thrown as `new Error(code)` and mapped by routes. */
export const DomainErrorCode = {
  COACH_NOT_FOUND: "COACH_NOT_FOUND",
  FAILURE_NOT_FOUND: "FAILURE_NOT_FOUND",
  INVALID_SUGGESTION_COLUMN: "INVALID_SUGGESTION_COLUMN",
} as const;

export type DomainErrorCode = (typeof DomainErrorCode)[keyof typeof DomainErrorCode];

export function isDomainError(error: unknown, code: DomainErrorCode): boolean {
  return error instanceof Error && error.message === code;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** One line per issue, prefixed with its path: "receiptDate: Invalid date". */
export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}
