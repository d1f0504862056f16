import type { FastifyReply } from 'fastify';
import {
  DependencyCycleError,
  EnablingExtensionError,
  ExtensionError,
  UnknownExtensionError,
} from '../extensions/errors.js';

/**
 * Extracts a readable message from an unknown error value.
 * Use in route catch blocks: `sendError(reply, 400, toErrorMessage(err))`
 */
export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : 'Unknown error';
}

const HTTP_STATUS_NAMES: Record<number, string> = {
  400: 'Bad Request',
  404: 'Not Found',
  409: 'Conflict',
  422: 'Unprocessable Entity',
  500: 'Internal Server Error',
  503: 'Service Unavailable',
};

export function httpStatusName(code: number): string {
  return HTTP_STATUS_NAMES[code] ?? 'Error';
}

export function sendError(reply: FastifyReply, statusCode: number, message: string) {
  return reply.code(statusCode).send({ error: httpStatusName(statusCode), message, statusCode });
}

/** Maps lifecycle errors onto HTTP status codes; anything else is a 500. */
export function statusForError(err: unknown): number {
  if (err instanceof UnknownExtensionError) return 404;
  if (err instanceof DependencyCycleError) return 409;
  if (err instanceof EnablingExtensionError) return 422;
  if (err instanceof ExtensionError) return 400;
  return 500;
}
