/**
 * Job application pipeline
 *
 * Fixed step order for turning a job posting into application documents.
 * The step bodies are injected; only `formatter` may be skipped.
 */

import type { Logger } from 'pino';
import type { PipelineStepDefinition } from '../types/pipeline.js';
import { PipelineOrchestrator } from './pipeline-orchestrator.js';

export const JOB_PIPELINE_STEPS = ['rinser', 'analyzer', 'creator', 'formatter'] as const;

export type JobPipelineStep = (typeof JOB_PIPELINE_STEPS)[number];

export type JobStepHandlers<TContext> = Record<
  JobPipelineStep,
  Omit<PipelineStepDefinition<TContext>, 'name'>
>;

export function createJobPipeline<TContext>(
  handlers: JobStepHandlers<TContext>,
  logger?: Logger
): PipelineOrchestrator<TContext> {
  return new PipelineOrchestrator<TContext>({
    steps: JOB_PIPELINE_STEPS.map((name) => ({ name, ...handlers[name] })),
    optionalStep: 'formatter',
    logger,
  });
}
