export type DomainErrorCategory = 'conflict' | 'policy_denied' | 'transient' | 'invalid_input';

const CATEGORY_BY_KIND = {
  ConflictingPaymentReference: 'conflict',
  AlreadyCreator: 'conflict',
  StoreNameTaken: 'conflict',
  EntitlementExpired: 'policy_denied',
  EntitlementExhausted: 'policy_denied',
  EntitlementRevoked: 'policy_denied',
  NotEntitled: 'policy_denied',
  DownloadTokenInvalid: 'policy_denied',
  CatalogUnavailable: 'transient',
  BlobStoreUnavailable: 'transient',
  AuditLogUnavailable: 'transient',
  InvalidLineItem: 'invalid_input',
  InvalidTransition: 'invalid_input',
  UnknownOrder: 'invalid_input',
  UnknownUser: 'invalid_input',
} as const satisfies Record<string, DomainErrorCategory>;

export type DomainErrorKind = keyof typeof CATEGORY_BY_KIND;

export class DomainError extends Error {
  readonly kind: DomainErrorKind;
  readonly category: DomainErrorCategory;
  readonly details: Record<string, unknown>;

  constructor(kind: DomainErrorKind, message: string, details: Record<string, unknown> = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DomainError';
    this.kind = kind;
    this.category = CATEGORY_BY_KIND[kind];
    this.details = details;
  }
}

export function isDomainError(error: unknown, kind?: DomainErrorKind): error is DomainError {
  if (!(error instanceof DomainError)) return false;
  return kind ? error.kind === kind : true;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
