export enum ProvisionerErrorCode {
  VALIDATION = 'VALIDATION',
  READINESS_TIMEOUT = 'READINESS_TIMEOUT',
  TOOL_MISSING = 'TOOL_MISSING',
  BEST_EFFORT = 'BEST_EFFORT',
  ENV_RECORD = 'ENV_RECORD',
  COMPOSE_FETCH = 'COMPOSE_FETCH',
  COMMAND_FAILED = 'COMMAND_FAILED',
}

export class ProvisionerError extends Error {
  readonly code: ProvisionerErrorCode;
  readonly context?: Record<string, unknown>;
  readonly exitCode: number = 1;

  constructor(code: ProvisionerErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'ProvisionerError';
    this.code = code;
    this.context = context;
  }
}

export class ValidationError extends ProvisionerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ProvisionerErrorCode.VALIDATION, message, context);
    this.name = 'ValidationError';
  }
}

export class ReadinessTimeoutError extends ProvisionerError {
  constructor(host: string, port: number, attempts: number) {
    super(
      ProvisionerErrorCode.READINESS_TIMEOUT,
      `${host}:${port} did not accept connections after ${attempts} attempts.`,
      { host, port, attempts },
    );
    this.name = 'ReadinessTimeoutError';
  }
}

export class ToolMissingError extends ProvisionerError {
  constructor(tool: string, message?: string) {
    super(ProvisionerErrorCode.TOOL_MISSING, message ?? `${tool} is not installed.`, { tool });
    this.name = 'ToolMissingError';
  }
}

export class BestEffortFailure extends ProvisionerError {
  constructor(step: string, cause: unknown) {
    super(ProvisionerErrorCode.BEST_EFFORT, `${step} failed: ${describeError(cause)}`, { step });
    this.name = 'BestEffortFailure';
  }
}

export class EnvRecordError extends ProvisionerError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(ProvisionerErrorCode.ENV_RECORD, message, context);
    this.name = 'EnvRecordError';
  }
}

export class ComposeFetchError extends ProvisionerError {
  constructor(url: string, reason: string) {
    super(ProvisionerErrorCode.COMPOSE_FETCH, `Failed to fetch ${url}: ${reason}`, { url });
    this.name = 'ComposeFetchError';
  }
}

export class CommandFailedError extends ProvisionerError {
  constructor(command: string, stderr: string) {
    super(ProvisionerErrorCode.COMMAND_FAILED, stderr || `Command failed: ${command}`, { command });
    this.name = 'CommandFailedError';
  }
}

export const describeError = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);
