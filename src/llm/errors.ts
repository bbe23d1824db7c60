/**
 * Provider errors for LLM completion adapters, and the mapping from HTTP
 * status codes to them. All of them are collaborator errors as far as
 * the engine is concerned.
 */

import { CollaboratorError } from "../engine/errors.js";

export class ProviderError extends CollaboratorError {
  readonly provider: string;
  readonly statusCode?: number;
  readonly errorCode?: string;
  /** Seconds the provider asked us to wait before retrying. */
  readonly retryAfter?: number;

  constructor(
    message: string,
    opts: {
      provider: string;
      statusCode?: number;
      errorCode?: string;
      retryable: boolean;
      retryAfter?: number;
      cause?: Error;
    },
  ) {
    super(message, { collaborator: opts.provider, retryable: opts.retryable, cause: opts.cause });
    this.name = "ProviderError";
    this.provider = opts.provider;
    this.statusCode = opts.statusCode;
    this.errorCode = opts.errorCode;
    this.retryAfter = opts.retryAfter;
  }
}

export class AuthenticationError extends ProviderError {
  constructor(msg: string, provider: string) {
    super(msg, { provider, statusCode: 401, retryable: false });
    this.name = "AuthenticationError";
  }
}

export class AccessDeniedError extends ProviderError {
  constructor(msg: string, provider: string) {
    super(msg, { provider, statusCode: 403, retryable: false });
    this.name = "AccessDeniedError";
  }
}

export class NotFoundError extends ProviderError {
  constructor(msg: string, provider: string) {
    super(msg, { provider, statusCode: 404, retryable: false });
    this.name = "NotFoundError";
  }
}

export class InvalidRequestError extends ProviderError {
  constructor(msg: string, provider: string, statusCode = 400) {
    super(msg, { provider, statusCode, retryable: false });
    this.name = "InvalidRequestError";
  }
}

export class ContextLengthError extends ProviderError {
  constructor(msg: string, provider: string) {
    super(msg, { provider, statusCode: 413, retryable: false });
    this.name = "ContextLengthError";
  }
}

export class ContentFilterError extends ProviderError {
  constructor(msg: string, provider: string) {
    super(msg, { provider, retryable: false });
    this.name = "ContentFilterError";
  }
}

export class RateLimitError extends ProviderError {
  constructor(msg: string, provider: string, retryAfter?: number) {
    super(msg, { provider, statusCode: 429, retryable: true, retryAfter });
    this.name = "RateLimitError";
  }
}

export class ServerError extends ProviderError {
  constructor(msg: string, provider: string, statusCode = 500) {
    super(msg, { provider, statusCode, retryable: true });
    this.name = "ServerError";
  }
}

export class NetworkError extends CollaboratorError {
  constructor(msg: string, provider: string, cause?: Error) {
    super(msg, { collaborator: provider, retryable: true, cause });
    this.name = "NetworkError";
  }
}

export class ConfigurationError extends CollaboratorError {
  constructor(msg: string, provider: string) {
    super(msg, { collaborator: provider, retryable: false });
    this.name = "ConfigurationError";
  }
}

/**
 * Map an HTTP status code to the matching error class. Unknown statuses
 * are classified by message and otherwise treated as retryable.
 */
export function errorFromStatusCode(
  statusCode: number,
  message: string,
  provider: string,
  opts?: { errorCode?: string; retryAfter?: number },
): ProviderError {
  switch (statusCode) {
    case 400:
    case 422:
      return new InvalidRequestError(message, provider, statusCode);
    case 401:
      return new AuthenticationError(message, provider);
    case 403:
      return new AccessDeniedError(message, provider);
    case 404:
      return new NotFoundError(message, provider);
    case 413:
      return new ContextLengthError(message, provider);
    case 429:
      return new RateLimitError(message, provider, opts?.retryAfter);
    case 500:
    case 502:
    case 503:
    case 504:
    case 529:
      return new ServerError(message, provider, statusCode);
    default: {
      const lower = message.toLowerCase();
      if (lower.includes("context length") || lower.includes("too many tokens")) {
        return new ContextLengthError(message, provider);
      }
      if (lower.includes("content filter") || lower.includes("safety")) {
        return new ContentFilterError(message, provider);
      }
      return new ProviderError(message, {
        provider,
        statusCode,
        errorCode: opts?.errorCode,
        retryable: true,
      });
    }
  }
}
