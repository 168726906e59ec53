/**
 * Test doubles for the inference provider and the metrics recorder
 *
 * ScriptedProvider answers from per-model queues so tests can stage
 * failures and recoveries without a model server.
 */

import type { InferenceProvider } from '../../src/providers/provider.js';
import type {
  ProviderCompletion,
  ProviderHealth,
  ProviderRequest,
} from '../../src/types/inference.js';
import type { MetricsEntry, MetricsInput, MetricsRecorder } from '../../src/types/metrics.js';

export type ScriptStep = string | Error;

export const FAKE_USAGE = { inputTokens: 12, outputTokens: 34, totalTokens: 46 };

export class ScriptedProvider implements InferenceProvider {
  readonly name = 'scripted';
  readonly requests: ProviderRequest[] = [];
  initialized = false;

  private readonly scripts = new Map<string, ScriptStep[]>();
  private readonly defaultContent: string;

  constructor(defaultContent = 'ok') {
    this.defaultContent = defaultContent;
  }

  /**
   * Queue replies for `model`; once the queue drains the default content is returned.
   */
  script(model: string, ...steps: ScriptStep[]): this {
    this.scripts.set(model, [...(this.scripts.get(model) ?? []), ...steps]);
    return this;
  }

  async initialize(): Promise<void> {
    this.initialized = true;
  }

  async shutdown(): Promise<void> {
    this.initialized = false;
  }

  async generate(request: ProviderRequest): Promise<ProviderCompletion> {
    this.requests.push(request);
    const step = this.scripts.get(request.model)?.shift() ?? this.defaultContent;
    if (step instanceof Error) {
      throw step;
    }
    return { content: step, model: request.model, usage: { ...FAKE_USAGE } };
  }

  async healthCheck(): Promise<ProviderHealth> {
    return { status: 'healthy', provider: this.name, details: {} };
  }

  callsFor(model: string): number {
    return this.requests.filter((request) => request.model === model).length;
  }
}

export class RecordingMetrics implements MetricsRecorder {
  readonly inputs: MetricsInput[] = [];
  failWith: Error | null = null;

  async record(input: MetricsInput): Promise<MetricsEntry> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.inputs.push(input);
    return {
      id: `metric-${this.inputs.length}`,
      timestamp: (input.timestamp ?? new Date()).toISOString(),
      model: input.model,
      module: input.module ?? null,
      jobId: input.jobId ?? null,
      durationMs: input.durationMs,
      promptTokens: input.promptTokens,
      completionTokens: input.completionTokens,
      success: input.success,
      errorType: input.errorType ?? null,
      retryCount: input.retryCount ?? 0,
      fallbackUsed: input.fallbackUsed ?? false,
      cpuPercent: null,
      memoryMb: null,
      temperatureC: null,
    };
  }
}
