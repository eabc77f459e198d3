import type { FastifyReply } from 'fastify';

import { type DomainErrorKind, isDomainError } from '../errors.js';
import { fail } from './httpResponses.js';

const STATUS_BY_KIND: Record<DomainErrorKind, number> = {
  InvalidLineItem: 400,
  DownloadTokenInvalid: 401,
  NotEntitled: 403,
  EntitlementRevoked: 403,
  UnknownOrder: 404,
  UnknownUser: 404,
  InvalidTransition: 409,
  ConflictingPaymentReference: 409,
  AlreadyCreator: 409,
  StoreNameTaken: 409,
  EntitlementExpired: 410,
  EntitlementExhausted: 410,
  CatalogUnavailable: 503,
  BlobStoreUnavailable: 503,
  AuditLogUnavailable: 503,
};

export function statusForKind(kind: DomainErrorKind): number {
  return STATUS_BY_KIND[kind];
}

/**
 * Sends the envelope for a DomainError. Anything else is rethrown so Fastify's
 * default handler logs it and answers 500.
 */
export function sendDomainError(reply: FastifyReply, error: unknown): FastifyReply {
  if (!isDomainError(error)) throw error;

  const status = STATUS_BY_KIND[error.kind];
  if (status >= 500) reply.log.warn({ err: error, kind: error.kind }, 'dependency unavailable');

  return reply.status(status).send(fail(error.message, { kind: error.kind, details: error.details }));
}
