import type { RunState } from './types/run.js';

export type PipelineErrorKind = 'config' | 'extract' | 'load' | 'load_timeout' | 'load_aborted' | 'aborted' | 'pipeline';

export class PipelineError extends Error {
  readonly kind: PipelineErrorKind;

  constructor(kind: PipelineErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.kind = kind;
  }
}

export class ConfigError extends PipelineError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super('config', issues.length ? `${message}: ${issues.join('; ')}` : message);
    this.issues = issues;
  }
}

export class ExtractError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('extract', message, options);
  }
}

export class LoadError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('load', message, options);
  }
}

export class LoadTimeoutError extends PipelineError {
  /** Null when the job was never acknowledged by the warehouse. */
  readonly jobId: string | null;
  readonly timeoutMs: number;

  constructor(jobId: string | null, timeoutMs: number) {
    super(
      'load_timeout',
      jobId
        ? `load job ${jobId} did not finish within ${timeoutMs}ms`
        : `load job submission did not finish within ${timeoutMs}ms`
    );
    this.jobId = jobId;
    this.timeoutMs = timeoutMs;
  }
}

export class LoadAbortedError extends PipelineError {
  readonly jobId: string;

  constructor(jobId: string) {
    super('load_aborted', `load job ${jobId} was cancelled before completion`);
    this.jobId = jobId;
  }
}

export class RunAbortedError extends PipelineError {
  constructor(message = 'run aborted') {
    super('aborted', message);
  }
}

export class PipelineRunError extends PipelineError {
  readonly state: RunState;

  constructor(state: RunState, cause: unknown) {
    super('pipeline', `pipeline halted in state ${state}: ${errorMessage(cause)}`, { cause });
    this.state = state;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
