import { describe, it, expect } from "vitest";
import {
  AccessDeniedError,
  AuthenticationError,
  ContentFilterError,
  ContextLengthError,
  errorFromStatusCode,
  InvalidRequestError,
  NotFoundError,
  ProviderError,
  RateLimitError,
  ServerError,
} from "./errors.js";

describe("errorFromStatusCode", () => {
  it.each([
    [400, InvalidRequestError, false],
    [422, InvalidRequestError, false],
    [401, AuthenticationError, false],
    [403, AccessDeniedError, false],
    [404, NotFoundError, false],
    [413, ContextLengthError, false],
    [429, RateLimitError, true],
    [500, ServerError, true],
    [529, ServerError, true],
  ] as const)("maps %i", (status, type, retryable) => {
    const err = errorFromStatusCode(status, "message", "anthropic");
    expect(err).toBeInstanceOf(type);
    expect(err.retryable).toBe(retryable);
    expect(err.kind).toBe("collaborator");
    expect(err.collaborator).toBe("anthropic");
  });

  it("carries retry-after on rate limits", () => {
    expect(errorFromStatusCode(429, "slow down", "anthropic", { retryAfter: 7 }).retryAfter).toBe(7);
  });

  it("classifies unknown statuses by message", () => {
    expect(errorFromStatusCode(418, "Context length exceeded", "anthropic")).toBeInstanceOf(ContextLengthError);
    expect(errorFromStatusCode(418, "Blocked by safety system", "anthropic")).toBeInstanceOf(ContentFilterError);

    const other = errorFromStatusCode(418, "teapot", "anthropic", { errorCode: "teapot_error" });
    expect(other).toBeInstanceOf(ProviderError);
    expect(other).toMatchObject({ statusCode: 418, errorCode: "teapot_error", retryable: true });
  });
});
