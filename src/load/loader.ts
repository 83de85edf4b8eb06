import { setTimeout as sleep } from 'node:timers/promises';
import { LoadAbortedError, LoadError, LoadTimeoutError, RunAbortedError, errorMessage } from '../errors.js';
import type { DiagnosticLog } from '../utils/diagnostics.js';
import type { TableSchema } from './schema.js';
import {
  isNotFound,
  qualifiedName,
  type LoadJob,
  type LoadJobStatus,
  type TableTarget,
  type WarehouseClient,
  type WarehouseRow,
} from './warehouse.js';

export type EnsureOutcome = 'exists' | 'created';

export async function ensureDataset(
  client: WarehouseClient,
  target: TableTarget,
  log: DiagnosticLog
): Promise<EnsureOutcome> {
  try {
    await client.getDataset(target.datasetId);
    log.info('load', `Dataset ${target.datasetId} already exists`);
    return 'exists';
  } catch (error) {
    if (!isNotFound(error)) {
      throw new LoadError(`dataset lookup failed for ${target.datasetId}: ${errorMessage(error)}`, { cause: error });
    }
  }

  await client.createDataset(target.datasetId, { location: target.location });
  log.info('load', `Created dataset ${target.datasetId} in ${target.location}`);
  return 'created';
}

export async function ensureTable(
  client: WarehouseClient,
  target: TableTarget,
  schema: TableSchema,
  log: DiagnosticLog
): Promise<EnsureOutcome> {
  try {
    await client.getTable(target.datasetId, target.tableId);
    log.info('load', `Table ${target.tableId} already exists`);
    return 'exists';
  } catch (error) {
    if (!isNotFound(error)) {
      throw new LoadError(`table lookup failed for ${target.tableId}: ${errorMessage(error)}`, { cause: error });
    }
  }

  await client.createTable(target.datasetId, target.tableId, schema);
  log.info('load', `Created table ${target.tableId}`);
  return 'created';
}

export type WaitOptions = {
  timeoutMs: number;
  pollIntervalMs: number;
  signal?: AbortSignal;
  log: DiagnosticLog;
};

const TIMED_OUT = Symbol('timed out');

// Starts the work only while time remains and settles with TIMED_OUT if the deadline passes first.
async function beforeDeadline<T>(start: () => Promise<T>, deadline: number): Promise<T | typeof TIMED_OUT> {
  const remaining = deadline - Date.now();
  if (remaining <= 0) return TIMED_OUT;

  const timer = new AbortController();
  try {
    return await Promise.race([start(), sleep<typeof TIMED_OUT>(remaining, TIMED_OUT, { signal: timer.signal })]);
  } finally {
    timer.abort();
  }
}

async function pause(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await sleep(ms, undefined, { signal });
  } catch (error) {
    if (!signal?.aborted) throw error;
  }
}

async function cancelQuietly(job: LoadJob, log: DiagnosticLog): Promise<void> {
  try {
    await job.cancel();
    log.warn('load', `Cancelled load job ${job.id}`);
  } catch (error) {
    log.error('load', `Could not cancel load job ${job.id}: ${errorMessage(error)}`);
  }
}

async function waitUntil(job: LoadJob, deadline: number, options: WaitOptions): Promise<LoadJobStatus> {
  const { timeoutMs, pollIntervalMs, signal, log } = options;

  while (true) {
    if (signal?.aborted) {
      await cancelQuietly(job, log);
      throw new LoadAbortedError(job.id);
    }

    const status = await beforeDeadline(() => job.status(), deadline);
    if (status === TIMED_OUT) {
      await cancelQuietly(job, log);
      throw new LoadTimeoutError(job.id, timeoutMs);
    }
    if (status.state === 'DONE') {
      return status;
    }

    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      await cancelQuietly(job, log);
      throw new LoadTimeoutError(job.id, timeoutMs);
    }
    await pause(Math.min(pollIntervalMs, remaining), signal);
  }
}

/**
 * Polls the job until the warehouse reports it DONE. Every status call is bounded
 * by `timeoutMs`; on timeout or abort the remote job is cancelled before rejecting.
 */
export async function waitForLoadJob(job: LoadJob, options: WaitOptions): Promise<LoadJobStatus> {
  return waitUntil(job, Date.now() + options.timeoutMs, options);
}

export type AppendOptions = WaitOptions & {
  schema?: TableSchema;
};

export type AppendOutcome = {
  jobId: string | null;
  loaded: number;
};

/**
 * Submits one WRITE_APPEND job and waits for it. Submission and completion share
 * a single `timeoutMs` budget; nothing is submitted once `signal` has fired.
 */
export async function appendBatch(
  client: WarehouseClient,
  target: TableTarget,
  rows: readonly WarehouseRow[],
  options: AppendOptions
): Promise<AppendOutcome> {
  const { log, signal } = options;
  const destination = qualifiedName(target);

  if (!rows.length) {
    log.warn('load', `No rows to load into ${destination}`);
    return { jobId: null, loaded: 0 };
  }
  if (signal?.aborted) {
    throw new RunAbortedError(`run aborted before loading into ${destination}`);
  }

  log.info('load', `Writing ${rows.length} rows to ${destination}...`);
  const deadline = Date.now() + options.timeoutMs;
  const submitted = client.startLoadJob(target.datasetId, target.tableId, {
    rows,
    schema: options.schema,
    writeDisposition: 'WRITE_APPEND',
  });

  let job: LoadJob | typeof TIMED_OUT;
  try {
    job = await beforeDeadline(() => submitted, deadline);
  } catch (error) {
    throw new LoadError(`could not submit load job for ${destination}: ${errorMessage(error)}`, { cause: error });
  }
  if (job === TIMED_OUT) {
    // A job acknowledged after the deadline is cancelled as soon as it shows up.
    void submitted.then(
      (late) => cancelQuietly(late, log),
      (error: unknown) => log.warn('load', `Load job submission failed after the timeout: ${errorMessage(error)}`)
    );
    throw new LoadTimeoutError(null, options.timeoutMs);
  }

  const status = await waitUntil(job, deadline, options);
  if (status.errorMessage) {
    throw new LoadError(`load job ${job.id} failed: ${status.errorMessage}`);
  }

  const loaded = status.outputRows ?? rows.length;
  log.info('load', `Loaded ${loaded} records into ${destination}`);
  return { jobId: job.id, loaded };
}
