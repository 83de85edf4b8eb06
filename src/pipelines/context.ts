import type { EtlConfig } from '../config.js';
import type { SourcePool } from '../db.js';
import { PipelineRunError, RunAbortedError, errorMessage } from '../errors.js';
import type { TableTarget, WarehouseClient } from '../load/warehouse.js';
import type { RunState } from '../types/run.js';
import type { DiagnosticLog } from '../utils/diagnostics.js';

export type PipelineContext = {
  config: EtlConfig;
  warehouse: WarehouseClient;
  log: DiagnosticLog;
  openSourcePool?: () => SourcePool;
  clock?: () => Date;
  signal?: AbortSignal;
};

export function tableTarget(config: EtlConfig, tableId: string): TableTarget {
  const { projectId, datasetId, location } = config.destination;
  return { projectId, datasetId, tableId, location };
}

export class RunTracker {
  private current: RunState = 'NotStarted';
  private readonly log: DiagnosticLog;
  private readonly signal?: AbortSignal;

  constructor(log: DiagnosticLog, signal?: AbortSignal) {
    this.log = log;
    this.signal = signal;
  }

  get state(): RunState {
    return this.current;
  }

  advance(next: RunState): void {
    this.log.info('pipeline', `${this.current} -> ${next}`);
    this.current = next;
    if (next !== 'Done') {
      this.checkpoint();
    }
  }

  /** Throws once the run's signal has fired, so no later stage starts. */
  checkpoint(): void {
    if (this.signal?.aborted) {
      throw new RunAbortedError(`run aborted in state ${this.current}`);
    }
  }
}

/**
 * Runs the stages of one pipeline. A failure leaves the run in the state it had
 * reached; nothing already created in the warehouse is rolled back. An aborted
 * `signal` stops the run at the next stage boundary.
 */
export async function runStages<T>(
  log: DiagnosticLog,
  stages: (run: RunTracker) => Promise<T>,
  signal?: AbortSignal
): Promise<T> {
  const run = new RunTracker(log, signal);
  try {
    run.checkpoint();
    return await stages(run);
  } catch (error) {
    log.error('pipeline', `Run halted in state ${run.state}: ${errorMessage(error)}`);
    throw new PipelineRunError(run.state, error);
  }
}
