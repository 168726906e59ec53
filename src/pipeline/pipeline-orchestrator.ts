/**
 * Pipeline Orchestrator
 *
 * Runs a fixed, ordered list of opaque async steps once per run. Each step
 * receives the context produced by the previous one. The first failing step
 * halts the run; `execute()` always resolves with a frozen PipelineRun.
 *
 * Progress goes to an optional per-run callback and to the `progress`
 * event. Both are best-effort: a throwing listener is logged and ignored.
 *
 * @module pipeline/pipeline-orchestrator
 */

import { EventEmitter } from 'eventemitter3';
import { randomUUID } from 'node:crypto';
import { performance } from 'node:perf_hooks';
import type { Logger } from 'pino';
import type {
  PipelineExecuteOptions,
  PipelineProgress,
  PipelineRun,
  PipelineStatus,
  PipelineStepDefinition,
  ProgressCallback,
  StepResult,
} from '../types/pipeline.js';
import type { PipelineEvents } from '../api/events.js';
import { StepExecutionError, describeError } from '../api/errors.js';

export interface PipelineOrchestratorOptions<TContext> {
  steps: readonly PipelineStepDefinition<TContext>[];
  /** Name of the single step callers may skip; must be the last step */
  optionalStep?: string;
  logger?: Logger;
}

/**
 * Eight-character run identifier.
 */
export function createRunId(): string {
  return randomUUID().slice(0, 8);
}

function capitalize(value: string): string {
  return value.length > 0 ? value[0].toUpperCase() + value.slice(1) : value;
}

function freezeStep(result: StepResult): StepResult {
  return Object.freeze({
    ...result,
    outputSummary: result.outputSummary ? Object.freeze({ ...result.outputSummary }) : null,
  });
}

export class PipelineOrchestrator<TContext> extends EventEmitter<PipelineEvents> {
  private readonly steps: readonly PipelineStepDefinition<TContext>[];
  private readonly optionalStep: string | null;
  private readonly logger?: Logger;

  constructor(options: PipelineOrchestratorOptions<TContext>) {
    super();

    if (options.steps.length === 0) {
      throw new Error('Pipeline requires at least one step');
    }

    const names = new Set<string>();
    for (const step of options.steps) {
      if (names.has(step.name)) {
        throw new Error(`Duplicate pipeline step: ${step.name}`);
      }
      names.add(step.name);
    }

    const last = options.steps[options.steps.length - 1];
    if (options.optionalStep !== undefined && options.optionalStep !== last.name) {
      throw new Error(`Optional step must be the final step (${last.name}), got ${options.optionalStep}`);
    }

    this.steps = [...options.steps];
    this.optionalStep = options.optionalStep ?? null;
    this.logger = options.logger;
  }

  public get stepNames(): string[] {
    return this.steps.map((step) => step.name);
  }

  /**
   * Run every step in order. Step failures are reported in the returned
   * run, never thrown.
   */
  public async execute(input: TContext, options: PipelineExecuteOptions = {}): Promise<PipelineRun<TContext>> {
    const runId = options.runId ?? createRunId();
    const stepsTotal = this.steps.length;
    const results: StepResult[] = [];
    const startedAt = new Date();
    const runStart = performance.now();

    let status: PipelineStatus = 'running';
    let currentStep: string | null = null;
    let failedStep: string | null = null;
    let error: string | null = null;
    let context = input;
    let stepsCompleted = 0;

    const report = (message: string): Promise<void> =>
      this.notifyProgress(options.onProgress, {
        runId,
        status,
        currentStep,
        stepsCompleted,
        stepsTotal,
        percent: (stepsCompleted / stepsTotal) * 100,
        message,
      });

    this.logger?.info({ runId, steps: this.stepNames }, 'Starting pipeline');
    await report('Starting pipeline execution');

    for (const step of this.steps) {
      currentStep = step.name;

      if (step.name === this.optionalStep && options.skipOptional) {
        results.push(freezeStep({
          step: step.name,
          status: 'skipped',
          startedAt: null,
          completedAt: null,
          durationMs: 0,
          error: null,
          outputSummary: null,
        }));
        stepsCompleted++;
        await report(`Skipped ${step.name} step`);
        continue;
      }

      await report(`Running ${step.name} step`);
      this.guardListeners('step:started', () => this.emit('step:started', runId, step.name));

      const stepStartedAt = new Date();
      const stepStart = performance.now();

      try {
        context = await step.run(context);
      } catch (cause) {
        const failure = new StepExecutionError(step.name, cause);
        const result = freezeStep({
          step: step.name,
          status: 'failed',
          startedAt: stepStartedAt.toISOString(),
          completedAt: new Date().toISOString(),
          durationMs: Math.round(performance.now() - stepStart),
          error: describeError(cause),
          outputSummary: null,
        });
        results.push(result);

        status = 'failed';
        failedStep = step.name;
        error = failure.message;
        this.guardListeners('step:failed', () => this.emit('step:failed', runId, result));
        this.logger?.error({ runId, step: step.name, error: failure.message }, 'Pipeline step failed');
        break;
      }

      const result = freezeStep({
        step: step.name,
        status: 'completed',
        startedAt: stepStartedAt.toISOString(),
        completedAt: new Date().toISOString(),
        durationMs: Math.round(performance.now() - stepStart),
        error: null,
        outputSummary: this.summarize(step, context),
      });
      results.push(result);
      stepsCompleted++;
      this.guardListeners('step:completed', () => this.emit('step:completed', runId, result));
      await report(`${capitalize(step.name)} step completed`);
    }

    if (status === 'running') {
      status = 'completed';
      currentStep = null;
    }

    const completedAt = new Date();
    const run: PipelineRun<TContext> = Object.freeze({
      runId,
      status,
      currentStep,
      failedStep,
      error,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      totalDurationMs: Math.round(performance.now() - runStart),
      steps: Object.freeze([...results]),
      output: context,
    });

    await report(status === 'completed' ? 'Pipeline completed' : 'Pipeline failed');
    this.guardListeners('run:completed', () => this.emit('run:completed', run));
    this.logger?.info({ runId, status, totalDurationMs: run.totalDurationMs }, `Pipeline ${status}`);

    return run;
  }

  /**
   * `execute()` without options.
   */
  public async executeSimple(input: TContext): Promise<PipelineRun<TContext>> {
    return this.execute(input);
  }

  private summarize(step: PipelineStepDefinition<TContext>, context: TContext): Record<string, unknown> | null {
    if (!step.summarize) {
      return null;
    }
    try {
      return step.summarize(context);
    } catch (error) {
      this.logger?.warn({ step: step.name, error: describeError(error) }, 'Step summary failed');
      return null;
    }
  }

  /**
   * Deliver progress to the callback and to `progress` listeners. Neither
   * may abort the run.
   */
  private async notifyProgress(callback: ProgressCallback | undefined, progress: PipelineProgress): Promise<void> {
    this.guardListeners('progress', () => this.emit('progress', progress));

    if (!callback) {
      return;
    }
    try {
      await callback(progress);
    } catch (error) {
      this.logger?.warn({ runId: progress.runId, error: describeError(error) }, 'Progress callback failed');
    }
  }

  private guardListeners(event: keyof PipelineEvents, emit: () => void): void {
    try {
      emit();
    } catch (error) {
      this.logger?.warn({ event, error: describeError(error) }, 'Pipeline event listener failed');
    }
  }
}
