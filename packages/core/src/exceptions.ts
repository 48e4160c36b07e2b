export interface FetchErrorOptions {
  readonly status?: number;
  readonly notFound?: boolean;
  readonly cause?: unknown;
}

export class FetchError extends Error {
  readonly url: string;
  readonly status: number | undefined;
  readonly notFound: boolean;

  constructor(url: string, reason: string, options: FetchErrorOptions = {}) {
    super(`Failed to fetch ${url}: ${reason}`);
    this.name = 'FetchError';
    this.url = url;
    this.status = options.status;
    this.notFound = options.notFound ?? false;
    this.cause = options.cause;
  }
}

export class MalformedDocumentError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'MalformedDocumentError';
    this.cause = cause;
  }
}

export class TimestampFormatError extends MalformedDocumentError {
  readonly value: string;

  constructor(value: string) {
    super(`Invalid lastmod timestamp: "${value}"`);
    this.name = 'TimestampFormatError';
    this.value = value;
  }
}

export class InvalidUrlError extends Error {
  readonly url: string;

  constructor(url: string, cause?: unknown) {
    super(`Not an absolute http(s) URL: ${url}`);
    this.name = 'InvalidUrlError';
    this.url = url;
    this.cause = cause;
  }
}

export class DocumentWriteError extends Error {
  readonly target: string;

  constructor(target: string, cause?: unknown) {
    const message = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to write ${target}: ${message}`);
    this.name = 'DocumentWriteError';
    this.target = target;
    this.cause = cause;
  }
}
