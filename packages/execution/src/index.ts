export { BaseExecutionContext } from "./core/execution-context"
export { createExecution, Execution } from "./core/execution"
export {
  createExecutionEngine,
  type ExecutionCollaborators,
  ExecutionEngine,
  type ExecutionEngineDeps,
} from "./core/execution-engine"
export { ExecutionError, type ExecutionErrorCode } from "./core/execution-error"
export type { CircuitBreaker } from "./ports/circuit-breaker"
export type { ExecutionContext } from "./ports/execution-context"
export type { IExecutionEngine } from "./ports/execution-engine"
export type { ExecutionListeners } from "./ports/listeners"
export { type RetryPolicy, UNLIMITED_RETRIES } from "./ports/retry-policy"
