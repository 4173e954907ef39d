/** A record candidate failed validation; `field` names the first failing column. */
export class ValidationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(`Invalid ${field}: ${message}`);
    this.name = 'ValidationError';
    this.field = field;
  }
}

/** The ledger file could not be created, read or written. */
export class PersistenceError extends Error {
  readonly path: string;

  constructor(path: string, message: string, options?: { cause?: unknown }) {
    super(`${message} (${path})`, options);
    this.name = 'PersistenceError';
    this.path = path;
  }
}

/** The outcome lacks a field the resolver needs, e.g. no closing line was published. */
export class UnresolvableOutcomeError extends Error {
  readonly gameId: string;
  readonly missing: string;

  constructor(gameId: string, missing: string) {
    super(`No ${missing} available for ${gameId}`);
    this.name = 'UnresolvableOutcomeError';
    this.gameId = gameId;
    this.missing = missing;
  }
}

/** No outcomes at all could be obtained for the date. */
export class OutcomeFetchError extends Error {
  readonly date: string;

  constructor(date: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'OutcomeFetchError';
    this.date = date;
  }
}

/** The prediction document for a date is unreadable or malformed. */
export class PredictionInputError extends Error {
  readonly file: string;

  constructor(file: string, message: string, options?: { cause?: unknown }) {
    super(`${message} (${file})`, options);
    this.name = 'PredictionInputError';
    this.file = file;
  }
}

export class HttpError extends Error {
  readonly status: number;
  readonly url: string;

  constructor(url: string, status: number) {
    super(`HTTP ${status} from ${url}`);
    this.name = 'HttpError';
    this.status = status;
    this.url = url;
  }
}
