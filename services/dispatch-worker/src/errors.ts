/**
 * Error taxonomy for the dispatch worker.
 *
 * Every fatal error carries the phase it surfaced in, which is what the
 * controller prints to stderr and what operators grep for.
 */

export type ErrorPhase =
  | 'parse'
  | 'validate'
  | 'execute'
  | 'timeout'
  | 'handler_execution';

export class DispatchError extends Error {
  readonly phase: ErrorPhase;

  constructor(message: string, phase: ErrorPhase, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.phase = phase;
  }
}

/** Malformed or missing task parameters. */
export class ParseError extends DispatchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'parse', options);
  }
}

/** Parameters parsed but do not fit the dispatched task kind. */
export class ValidationError extends DispatchError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message, 'validate');
    this.issues = issues;
  }
}

export class UnsupportedTaskError extends DispatchError {
  constructor(kind: string) {
    super(`unsupported task type: ${kind}`, 'execute');
  }
}

export class DeadlineExceededError extends DispatchError {
  readonly deadlineMs: number;

  constructor(deadlineMs: number) {
    super(`task execution timed out after ${Math.round(deadlineMs / 1000)}s`, 'timeout');
    this.deadlineMs = deadlineMs;
  }
}

/** Raised at a suspension point when the execution context is already aborted. */
export class ContextCancelledError extends Error {
  constructor(operation: string, reason?: unknown) {
    const detail = reason instanceof Error ? `: ${reason.message}` : '';
    super(`${operation} cancelled${detail}`, { cause: reason });
    this.name = 'ContextCancelledError';
  }
}

export class PluginNotFoundError extends Error {
  constructor(name: string) {
    super(`plugin not found: ${name}`);
    this.name = 'PluginNotFoundError';
  }
}

export class PluginCapabilityError extends Error {
  constructor(name: string, capability: string) {
    super(`plugin ${name} does not provide a ${capability} component`);
    this.name = 'PluginCapabilityError';
  }
}

export class PluginStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PluginStateError';
  }
}

export class CommandError extends Error {
  readonly command: string;
  readonly exitCode: number | null;
  readonly output: string;

  constructor(command: string, exitCode: number | null, output: string) {
    super(
      `${command} exited with code ${exitCode ?? 'null'}${output ? `: ${output}` : ''}`,
    );
    this.name = 'CommandError';
    this.command = command;
    this.exitCode = exitCode;
    this.output = output;
  }
}

export class BusConnectionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BusConnectionError';
  }
}

export class PublishError extends Error {
  readonly subject: string;

  constructor(subject: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`failed to publish to ${subject}: ${reason}`, { cause });
    this.name = 'PublishError';
    this.subject = subject;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
