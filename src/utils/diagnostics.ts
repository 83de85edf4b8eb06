export type Severity = 'info' | 'warn' | 'error';

export type Stage = 'extract' | 'transform' | 'load' | 'report' | 'pipeline';

export type DiagnosticEvent = {
  at: string;
  severity: Severity;
  stage: Stage;
  message: string;
  details?: unknown;
};

export type DiagnosticSink = (event: DiagnosticEvent) => void;

/**
 * Ordered stream of run diagnostics. Every event is kept for the caller
 * (tests, the CLI summary) and forwarded to the configured sinks as it happens.
 */
export class DiagnosticLog {
  private readonly entries: DiagnosticEvent[] = [];
  private readonly sinks: DiagnosticSink[];
  private readonly now: () => Date;

  constructor(sinks: DiagnosticSink[] = [], now: () => Date = () => new Date()) {
    this.sinks = sinks;
    this.now = now;
  }

  get events(): readonly DiagnosticEvent[] {
    return this.entries;
  }

  emit(severity: Severity, stage: Stage, message: string, details?: unknown): void {
    const event: DiagnosticEvent = { at: this.now().toISOString(), severity, stage, message };
    if (details !== undefined) {
      event.details = details;
    }
    this.entries.push(event);
    for (const sink of this.sinks) {
      sink(event);
    }
  }

  info(stage: Stage, message: string, details?: unknown): void {
    this.emit('info', stage, message, details);
  }

  warn(stage: Stage, message: string, details?: unknown): void {
    this.emit('warn', stage, message, details);
  }

  error(stage: Stage, message: string, details?: unknown): void {
    this.emit('error', stage, message, details);
  }

  count(severity: Severity, stage?: Stage): number {
    return this.entries.filter((event) => event.severity === severity && (!stage || event.stage === stage)).length;
  }
}

export function formatEvent(event: DiagnosticEvent): string {
  return `[${event.stage.toUpperCase()}] ${event.message}`;
}

export const consoleSink: DiagnosticSink = (event) => {
  const line = formatEvent(event);
  if (event.severity === 'error') {
    console.error(line);
  } else if (event.severity === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
};
