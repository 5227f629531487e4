import type { BuildLogEvent, LogOutput } from '@dockhand/contracts';
import { errorMessage } from '../errors';
import type { LogBus } from './client';

const NEWLINE = 0x0a;

export interface LogWriterOptions {
  deploymentId: string;
  jobId: number;
  serviceId: string;
  ownerId: string;
  output: LogOutput;
  phase: string;
}

/**
 * Turns a byte stream into line-oriented build log events.
 *
 * Complete lines are published as soon as their newline arrives; a trailing
 * partial line stays buffered until more bytes complete it or until
 * flush()/close(). An event carries the phase that was current when the
 * write() or flush() call completing its line was made, not when its first
 * byte arrived.
 *
 * Every mutation and publish runs on one serial chain, so overlapping
 * write() calls from several producers never tear or reorder lines.
 */
export class LogWriter {
  private readonly bus: LogBus | null;
  private readonly options: LogWriterOptions;
  private phase: string;
  private buffer: Buffer = Buffer.alloc(0);
  private sequence = 0;
  private chain: Promise<void> = Promise.resolve();
  private closed = false;

  constructor(bus: LogBus | null, options: LogWriterOptions) {
    this.bus = bus;
    this.options = options;
    this.phase = options.phase;
  }

  get output(): LogOutput {
    return this.options.output;
  }

  get currentPhase(): string {
    return this.phase;
  }

  /**
   * Always resolves with the full input length. Publish failures here are
   * logged and dropped so a broken bus never fails the build it observes.
   * Writes made after close() are discarded.
   */
  write(chunk: Buffer | string): Promise<number> {
    const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
    const phase = this.phase;

    if (this.closed) return Promise.resolve(bytes.length);

    return this.exclusive(async () => {
      this.buffer = this.buffer.length === 0 ? Buffer.from(bytes) : Buffer.concat([this.buffer, bytes]);

      let index = this.buffer.indexOf(NEWLINE);
      while (index !== -1) {
        const line = this.buffer.subarray(0, index + 1).toString('utf8');
        this.buffer = this.buffer.subarray(index + 1);

        try {
          await this.emit(line, phase);
        } catch (error) {
          console.warn(
            `[LogWriter] Failed to publish build log for ${this.options.deploymentId}:`,
            errorMessage(error),
          );
        }

        index = this.buffer.indexOf(NEWLINE);
      }

      return bytes.length;
    });
  }

  /** Applies to lines completed by later write() or flush() calls, including one already partly buffered. */
  setPhase(phase: string): void {
    this.phase = phase;
  }

  /** Publish whatever is buffered as one event, newline or not. */
  flush(): Promise<void> {
    const phase = this.phase;

    return this.exclusive(async () => {
      if (this.buffer.length === 0) return;

      const content = this.buffer.toString('utf8');
      await this.emit(content, phase);
      this.buffer = Buffer.alloc(0);
    });
  }

  /** Flush, then stop accepting writes. Writes queued before the call still publish. */
  close(): Promise<void> {
    this.closed = true;
    return this.flush();
  }

  private async emit(content: string, phase: string): Promise<void> {
    this.sequence++;

    const event: BuildLogEvent = {
      deploymentId: this.options.deploymentId,
      jobId: this.options.jobId,
      serviceId: this.options.serviceId,
      ownerId: this.options.ownerId,
      logOutput: this.options.output,
      content,
      timestamp: Date.now(),
      sequence: this.sequence,
      phase,
    };

    if (this.bus) {
      await this.bus.publishBuildLog(event);
    }
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.chain.then(task);
    this.chain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
