export type SyncErrorKind = 'RESOLUTION' | 'PLAN_REQUEST' | 'ORDER_SUBMISSION' | 'BROKER_REQUEST' | 'CONFIG';

export type ErrorContext = Record<string, string | number | undefined>;

const formatContext = (context: ErrorContext) =>
  Object.entries(context)
    .filter(([, v]) => v !== undefined && v !== '')
    .map(([k, v]) => `${k}=${v}`)
    .join(' ');

export class SyncError extends Error {
  readonly kind: SyncErrorKind;
  readonly context: ErrorContext;

  constructor(kind: SyncErrorKind, message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    const ctx = formatContext(context);
    super(ctx ? `${message} [${ctx}]` : message, options);
    this.name = new.target.name;
    this.kind = kind;
    this.context = context;
  }
}

/** A security or price could not be resolved; the sync must not proceed on partial pricing. */
export class ResolutionError extends SyncError {
  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super('RESOLUTION', message, context, options);
  }
}

export class PlanRequestError extends SyncError {
  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super('PLAN_REQUEST', message, context, options);
  }
}

export class OrderSubmissionError extends SyncError {
  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super('ORDER_SUBMISSION', message, context, options);
  }
}

export class BrokerRequestError extends SyncError {
  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super('BROKER_REQUEST', message, context, options);
  }
}

export class ConfigError extends SyncError {
  constructor(message: string, context: ErrorContext = {}) {
    super('CONFIG', message, context);
  }
}

export const describeError = (err: unknown): string => {
  if (err instanceof Error) {
    const cause = err.cause instanceof Error ? ` (caused by: ${err.cause.message})` : '';
    return `${err.message}${cause}`;
  }
  return String(err);
};
