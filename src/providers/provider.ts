/**
 * Inference provider boundary
 *
 * A provider turns one resolved request (model already chosen) into one
 * completion. It holds no per-call model state, so the client can switch
 * models between attempts without mutating anything shared.
 *
 * Providers signal failures with TransientProviderError (retryable) or
 * TerminalProviderError.
 */

import type { ProviderCompletion, ProviderHealth, ProviderRequest } from '../types/inference.js';

export interface InferenceProvider {
  readonly name: string;
  initialize(): Promise<void>;
  shutdown(): Promise<void>;
  generate(request: ProviderRequest): Promise<ProviderCompletion>;
  healthCheck(): Promise<ProviderHealth>;
}
