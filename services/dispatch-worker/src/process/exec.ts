import { spawn } from 'child_process';
import { CommandError, ContextCancelledError } from '../errors';
import type { LogWriter } from '../bus/log-writer';
import type { ExecutionContext } from '../types';

const TAIL_BYTES = 4096;
const MAX_CAPTURE_BYTES = 1024 * 1024;
const NEWLINE = 0x0a;

type OutputSource = 'stdout' | 'stderr';

export interface RunCommandOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /** Written to the child's stdin, then stdin is closed. */
  input?: string;
  /** Values masked in every line of output before it is logged or reported. */
  redact?: string[];
  /** Keep the child's output out of the build log (still kept for errors). */
  quiet?: boolean;
}

export interface CommandResult {
  stdout: string;
  exitCode: number;
}

export function redact(text: string, secrets: readonly string[] = []): string {
  return secrets.reduce(
    (result, secret) => (secret ? result.split(secret).join('***REDACTED***') : result),
    text,
  );
}

/**
 * Run a subprocess without a shell. Output goes line by line to the context's
 * log writers (or this process's own streams when there are none); the
 * context's signal kills the child.
 */
export function runCommand(
  ctx: ExecutionContext,
  command: string,
  args: string[],
  options: RunCommandOptions = {},
): Promise<CommandResult> {
  const display = redact([command, ...args].join(' '), options.redact);

  if (ctx.signal.aborted) {
    return Promise.reject(new ContextCancelledError(display, ctx.signal.reason));
  }

  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, args, {
      cwd: options.cwd ?? ctx.workDir,
      env: options.env ?? process.env,
      signal: ctx.signal,
      stdio: ['pipe', 'pipe', 'pipe'],
    });

    let tail = '';
    let captured = '';
    let pending: Promise<unknown> = Promise.resolve();
    let settled = false;
    let stdinError: Error | undefined;

    const forward = (writer: LogWriter | undefined, local: NodeJS.WriteStream, text: string) => {
      if (options.quiet) return;
      if (writer) {
        pending = Promise.all([pending, writer.write(text)]);
      } else {
        local.write(text);
      }
    };

    // Lines are split on raw bytes, then decoded and redacted whole.
    const emitLine = (source: OutputSource, bytes: Buffer) => {
      const text = redact(bytes.toString('utf8'), options.redact);
      tail = (tail + text).slice(-TAIL_BYTES);
      if (source === 'stdout') {
        if (captured.length < MAX_CAPTURE_BYTES) captured += text;
        forward(ctx.stdout, process.stdout, text);
      } else {
        forward(ctx.stderr, process.stderr, text);
      }
    };

    const partial: Record<OutputSource, Buffer> = {
      stdout: Buffer.alloc(0),
      stderr: Buffer.alloc(0),
    };

    const collect = (source: OutputSource) => (chunk: Buffer) => {
      let buffer = partial[source].length === 0 ? chunk : Buffer.concat([partial[source], chunk]);
      let index = buffer.indexOf(NEWLINE);
      while (index !== -1) {
        emitLine(source, buffer.subarray(0, index + 1));
        buffer = buffer.subarray(index + 1);
        index = buffer.indexOf(NEWLINE);
      }
      partial[source] = buffer;
    };

    const drain = () => {
      for (const source of ['stdout', 'stderr'] as const) {
        if (partial[source].length > 0) {
          emitLine(source, partial[source]);
          partial[source] = Buffer.alloc(0);
        }
      }
    };

    child.stdout.on('data', collect('stdout'));
    child.stderr.on('data', collect('stderr'));

    // EPIPE means the child exited without reading its input; its exit code decides.
    child.stdin.on('error', (error: NodeJS.ErrnoException) => {
      if (error.code !== 'EPIPE') stdinError = error;
    });

    child.on('error', (error: Error) => {
      if (settled) return;
      settled = true;
      if (ctx.signal.aborted) {
        reject(new ContextCancelledError(display, ctx.signal.reason));
      } else {
        reject(new CommandError(display, null, redact(error.message, options.redact)));
      }
    });

    child.on('close', (code: number | null) => {
      if (settled) return;
      settled = true;
      drain();

      pending.then(
        () => {
          if (ctx.signal.aborted) {
            reject(new ContextCancelledError(display, ctx.signal.reason));
          } else if (code !== 0) {
            reject(new CommandError(display, code, tail.trim()));
          } else if (stdinError) {
            reject(new CommandError(display, code, redact(stdinError.message, options.redact)));
          } else {
            resolve({ stdout: captured, exitCode: code });
          }
        },
        reject,
      );
    });

    if (options.input !== undefined) {
      child.stdin.end(options.input);
    } else {
      child.stdin.end();
    }
  });
}
