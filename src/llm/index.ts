export { AnthropicCompletionProvider } from "./anthropic.js";
export type { AnthropicConfig } from "./anthropic.js";
export {
  ProviderError, AuthenticationError, AccessDeniedError, NotFoundError, InvalidRequestError,
  ContextLengthError, ContentFilterError, RateLimitError, ServerError, NetworkError, ConfigurationError,
  errorFromStatusCode,
} from "./errors.js";
export { retry, delayForAttempt, DEFAULT_RETRY_POLICY } from "./retry.js";
export type { RetryPolicy } from "./retry.js";
