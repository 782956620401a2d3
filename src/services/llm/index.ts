export type { ChatMessage, ChatRole, GenerationOptions, GenerativeBackend } from './types.js';
export { OllamaChatClient, resolveGenerativeBackend, type OllamaClientConfig } from './ollama.js';
export {
  CircuitBreaker,
  CircuitBreakerOpenError,
  CircuitState,
  isServerError,
  type CircuitBreakerConfig,
  type CircuitBreakerStatus,
} from './circuit-breaker.js';
