import type { PipelineName, PipelineResult } from '../types/run.js';
import type { PipelineContext } from './context.js';
import { runCsvSalesPipeline } from './csv-sales.js';
import { runInlineSalesPipeline } from './inline-sales.js';
import { runRecentOrdersPipeline } from './recent-orders.js';

export type PipelineOptions = {
  csvPath?: string;
};

export function runPipeline(
  name: PipelineName,
  context: PipelineContext,
  options: PipelineOptions = {}
): Promise<PipelineResult> {
  switch (name) {
    case 'csv-sales':
      return runCsvSalesPipeline(context, options.csvPath);
    case 'recent-orders':
      return runRecentOrdersPipeline(context);
    case 'inline-sales':
      return runInlineSalesPipeline(context);
  }
}

export { runCsvSalesPipeline, runInlineSalesPipeline, runRecentOrdersPipeline };
export type { PipelineContext } from './context.js';
