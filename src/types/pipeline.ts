/**
 * Pipeline Types
 */

export type StepStatus = 'pending' | 'running' | 'completed' | 'failed' | 'skipped';

export type PipelineStatus = 'pending' | 'running' | 'completed' | 'failed';

export interface StepResult {
  readonly step: string;
  readonly status: StepStatus;
  readonly startedAt: string | null;
  readonly completedAt: string | null;
  readonly durationMs: number;
  readonly error: string | null;
  readonly outputSummary: Readonly<Record<string, unknown>> | null;
}

export interface PipelineRun<TContext = unknown> {
  readonly runId: string;
  readonly status: PipelineStatus;
  readonly currentStep: string | null;
  readonly failedStep: string | null;
  readonly error: string | null;
  readonly startedAt: string;
  readonly completedAt: string;
  readonly totalDurationMs: number;
  readonly steps: readonly StepResult[];
  /**
   * Context after the last completed step. On a failed run this is what
   * the steps before `failedStep` produced (the input if the first failed).
   */
  readonly output: TContext;
}

export interface PipelineProgress {
  runId: string;
  status: PipelineStatus;
  currentStep: string | null;
  stepsCompleted: number;
  stepsTotal: number;
  /** 0 - 100 */
  percent: number;
  message: string;
}

export type ProgressCallback = (progress: PipelineProgress) => void | Promise<void>;

/**
 * One opaque unit of pipeline work. Steps thread a single context value:
 * each receives the context produced by the previous step.
 */
export interface PipelineStepDefinition<TContext> {
  name: string;
  run: (context: TContext) => Promise<TContext>;
  summarize?: (context: TContext) => Record<string, unknown>;
}

export interface PipelineExecuteOptions {
  /** Skip the optional step, if the pipeline declares one */
  skipOptional?: boolean;
  onProgress?: ProgressCallback;
  runId?: string;
}
