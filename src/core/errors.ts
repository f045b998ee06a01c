export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'CONFIG_INVALID', details);
  }
}

export class UnknownAgentError extends AppError {
  constructor(agentName: string) {
    super(`Unknown agent: ${agentName}`, 'UNKNOWN_AGENT', { agentName });
  }
}

export class InvalidOutcomeError extends AppError {
  constructor(agentName: string, issues: string) {
    super(`Invalid outcome for ${agentName}: ${issues}`, 'INVALID_OUTCOME', { agentName, issues });
  }
}

export class ExplainerError extends AppError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'EXPLAINER_FAILED', details);
  }
}

export class TimeoutError extends AppError {
  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`, 'TIMEOUT', { label, timeoutMs });
  }
}

export const describeError = (err: unknown): string =>
  err instanceof Error ? err.message : String(err);
