/**
 * Event System
 *
 * Event payloads and typed event maps for the inference client, the
 * metrics store and the pipeline orchestrator.
 */

import type { PipelineProgress, PipelineRun, StepResult } from '../types/pipeline.js';
import type { MetricsEntry, ArchiveResult } from '../types/metrics.js';
import type { InferenceErrorShape } from './errors.js';

/**
 * Event payload when a provider attempt fails
 */
export interface AttemptFailedEvent {
  requestId: string;
  model: string;
  attempt: number;
  fallbackUsed: boolean;
  willRetry: boolean;
  error: InferenceErrorShape;
  timestamp: number;
}

/**
 * Event payload when the client switches to the fallback model
 */
export interface FallbackEngagedEvent {
  requestId: string;
  primaryModel: string;
  fallbackModel: string;
  reason: string;
  timestamp: number;
}

/**
 * Event payload when a request is answered from the cache
 */
export interface CacheHitEvent {
  requestId: string;
  key: string;
  timestamp: number;
}

/**
 * Event payload when a request settles
 */
export interface RequestCompletedEvent {
  requestId: string;
  success: boolean;
  model: string | null;
  cached: boolean;
  latencyMs: number;
  timestamp: number;
}

/**
 * Inference client event map
 */
export interface InferenceClientEvents {
  'attempt:failed': (event: AttemptFailedEvent) => void;
  'fallback:engaged': (event: FallbackEngagedEvent) => void;
  'cache:hit': (event: CacheHitEvent) => void;
  'request:completed': (event: RequestCompletedEvent) => void;
}

/**
 * Metrics store event map
 */
export interface MetricsStoreEvents {
  recorded: (entry: MetricsEntry) => void;
  archived: (result: ArchiveResult) => void;
  'persist:failed': (error: InferenceErrorShape) => void;
}

/**
 * Pipeline orchestrator event map
 */
export interface PipelineEvents {
  progress: (progress: PipelineProgress) => void;
  'step:started': (runId: string, step: string) => void;
  'step:completed': (runId: string, result: StepResult) => void;
  'step:failed': (runId: string, result: StepResult) => void;
  'run:completed': (run: PipelineRun) => void;
}
