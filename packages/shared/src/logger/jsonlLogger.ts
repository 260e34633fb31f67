import * as fs from 'fs/promises';
import type { PipelineEvent } from '../types/events';
import { redact } from '../redaction';
import type { Logger } from './types';

/** Console mirroring and the bindings a child logger carries */
export interface JsonlLoggerOptions {
  /** Mirror debug lines to the console */
  verbose?: boolean;
  bindings?: Record<string, unknown>;
}

/**
 * Appends events as JSON lines to a file and mirrors messages to the console.
 */
export class JsonlLogger implements Logger {
  private filePath: string;
  private readonly verbose: boolean;
  private readonly bindings: Record<string, unknown>;

  constructor(filePath: string, options: JsonlLoggerOptions = {}) {
    this.filePath = filePath;
    this.verbose = options.verbose ?? false;
    this.bindings = options.bindings ?? {};
  }

  async log(event: PipelineEvent): Promise<void> {
    const line = JSON.stringify(redact(event)) + '\n';
    try {
      await fs.appendFile(this.filePath, line, 'utf8');
    } catch (error) {
      // Best-effort: a broken log file must not fail the run.
      console.error(`Failed to write to log file at ${this.filePath}`, error);
    }
  }

  async trace(event: PipelineEvent, _message: string): Promise<void> {
    await this.log(event);
  }

  debug(message: string): void {
    if (!this.verbose) return;
    console.debug(this.withPrefix(message));
  }

  info(message: string): void {
    console.info(this.withPrefix(message));
  }

  warn(message: string): void {
    console.warn(this.withPrefix(message));
  }

  error(error: Error, message?: string): void {
    if (message) {
      console.error(this.withPrefix(message), error);
    } else {
      console.error(error);
    }
  }

  child(bindings: Record<string, unknown>): Logger {
    return new JsonlLogger(this.filePath, {
      verbose: this.verbose,
      bindings: { ...this.bindings, ...bindings },
    });
  }

  private withPrefix(message: string): string {
    const prefix = Object.entries(this.bindings)
      .map(([k, v]) => `${k}=${String(v)}`)
      .join(' ');
    return prefix ? `[${prefix}] ${message}` : message;
  }
}
