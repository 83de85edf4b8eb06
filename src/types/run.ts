export const PIPELINE_NAMES = ['csv-sales', 'recent-orders', 'inline-sales'] as const;

export type PipelineName = (typeof PIPELINE_NAMES)[number];

export type RunState =
  | 'NotStarted'
  | 'Extracted'
  | 'Transformed'
  | 'DatasetEnsured'
  | 'TableEnsured'
  | 'Loaded'
  | 'Verified'
  | 'Done';

export type ReportOutcome =
  | { status: 'ok'; lines: string[] }
  | { status: 'failed'; error: string }
  | { status: 'skipped' };

export type PipelineResult = {
  pipeline: PipelineName;
  state: RunState;
  extracted: number;
  transformed: number;
  rejected: number;
  loaded: number;
  loadedAt: string | null;
  jobId: string | null;
  report: ReportOutcome;
};
