/**
 * Pipeline Orchestrator Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { PipelineOrchestrator, createRunId } from '../../../src/pipeline/pipeline-orchestrator.js';
import type { PipelineProgress, PipelineStepDefinition } from '../../../src/types/pipeline.js';

interface Doc {
  trail: string[];
}

const append = (name: string): PipelineStepDefinition<Doc> => ({
  name,
  run: async (doc) => ({ trail: [...doc.trail, name] }),
  summarize: (doc) => ({ length: doc.trail.length }),
});

const failing = (name: string, message: string): PipelineStepDefinition<Doc> => ({
  name,
  run: async () => {
    throw new Error(message);
  },
});

const fourSteps = (): PipelineStepDefinition<Doc>[] => [
  append('rinser'),
  append('analyzer'),
  append('creator'),
  append('formatter'),
];

describe('PipelineOrchestrator', () => {
  describe('construction', () => {
    it('should require at least one step', () => {
      expect(() => new PipelineOrchestrator<Doc>({ steps: [] })).toThrow('Pipeline requires at least one step');
    });

    it('should reject duplicate step names', () => {
      expect(() => new PipelineOrchestrator({ steps: [append('a'), append('a')] })).toThrow(
        'Duplicate pipeline step: a'
      );
    });

    it('should require the optional step to be last', () => {
      expect(
        () => new PipelineOrchestrator({ steps: fourSteps(), optionalStep: 'analyzer' })
      ).toThrow('Optional step must be the final step (formatter), got analyzer');
    });

    it('should expose step names in order', () => {
      const pipeline = new PipelineOrchestrator({ steps: fourSteps() });

      expect(pipeline.stepNames).toEqual(['rinser', 'analyzer', 'creator', 'formatter']);
    });
  });

  describe('execute', () => {
    it('should thread the context through every step', async () => {
      const pipeline = new PipelineOrchestrator({ steps: fourSteps() });

      const run = await pipeline.execute({ trail: [] });

      expect(run.status).toBe('completed');
      expect(run.currentStep).toBeNull();
      expect(run.failedStep).toBeNull();
      expect(run.error).toBeNull();
      expect(run.output).toEqual({ trail: ['rinser', 'analyzer', 'creator', 'formatter'] });
      expect(run.steps.map((step) => [step.step, step.status])).toEqual([
        ['rinser', 'completed'],
        ['analyzer', 'completed'],
        ['creator', 'completed'],
        ['formatter', 'completed'],
      ]);
      expect(run.steps[1].outputSummary).toEqual({ length: 2 });
      expect(run.runId).toHaveLength(8);
    });

    it('should halt at the first failing step', async () => {
      const creator = vi.fn(async (doc: Doc) => doc);
      const pipeline = new PipelineOrchestrator<Doc>({
        steps: [append('rinser'), failing('analyzer', 'boom'), { name: 'creator', run: creator }],
      });

      const run = await pipeline.execute({ trail: [] });

      expect(run.status).toBe('failed');
      expect(run.failedStep).toBe('analyzer');
      expect(run.currentStep).toBe('analyzer');
      expect(run.error).toBe('Analyzer step failed: boom');
      expect(run.output).toEqual({ trail: ['rinser'] });
      expect(run.steps).toHaveLength(2);
      expect(run.steps[1]).toMatchObject({ step: 'analyzer', status: 'failed', error: 'boom', outputSummary: null });
      expect(creator).not.toHaveBeenCalled();
    });

    it('should keep the output of completed steps when a later step fails', async () => {
      const pipeline = new PipelineOrchestrator<{ job: string }>({
        steps: [
          { name: 'rinser', run: async () => ({ job: 'extracted job' }) },
          {
            name: 'analyzer',
            run: async () => {
              throw new Error('model unavailable');
            },
          },
        ],
      });

      const run = await pipeline.execute({ job: 'raw posting' });

      expect(run.status).toBe('failed');
      expect(run.output).toEqual({ job: 'extracted job' });
      expect(run.steps[0]).toMatchObject({ step: 'rinser', status: 'completed', outputSummary: null });
    });

    it('should return the input as output when the first step fails', async () => {
      const pipeline = new PipelineOrchestrator<Doc>({ steps: [failing('rinser', 'boom'), append('analyzer')] });

      const run = await pipeline.execute({ trail: ['seed'] });

      expect(run.output).toEqual({ trail: ['seed'] });
    });

    it('should resolve rather than throw when a step throws a non-Error', async () => {
      const pipeline = new PipelineOrchestrator<Doc>({
        steps: [
          {
            name: 'rinser',
            run: async () => {
              throw 'plain string';
            },
          },
        ],
      });

      const run = await pipeline.execute({ trail: [] });

      expect(run.error).toBe('Rinser step failed: plain string');
    });

    it('should skip the optional step on request', async () => {
      const pipeline = new PipelineOrchestrator({ steps: fourSteps(), optionalStep: 'formatter' });

      const run = await pipeline.execute({ trail: [] }, { skipOptional: true });

      expect(run.status).toBe('completed');
      expect(run.output).toEqual({ trail: ['rinser', 'analyzer', 'creator'] });
      expect(run.steps[3]).toEqual({
        step: 'formatter',
        status: 'skipped',
        startedAt: null,
        completedAt: null,
        durationMs: 0,
        error: null,
        outputSummary: null,
      });
    });

    it('should ignore skipOptional without an optional step', async () => {
      const pipeline = new PipelineOrchestrator({ steps: fourSteps() });

      const run = await pipeline.execute({ trail: [] }, { skipOptional: true });

      expect(run.steps.every((step) => step.status === 'completed')).toBe(true);
    });

    it('should use a caller-supplied run id', async () => {
      const pipeline = new PipelineOrchestrator({ steps: fourSteps() });

      const run = await pipeline.execute({ trail: [] }, { runId: 'job-0042' });

      expect(run.runId).toBe('job-0042');
    });

    it('should freeze the run and its steps', async () => {
      const pipeline = new PipelineOrchestrator({ steps: fourSteps() });

      const run = await pipeline.execute({ trail: [] });

      expect(Object.isFrozen(run)).toBe(true);
      expect(Object.isFrozen(run.steps)).toBe(true);
      expect(Object.isFrozen(run.steps[0])).toBe(true);
      expect(Object.isFrozen(run.steps[0].outputSummary)).toBe(true);
    });

    it('should keep a summary failure from failing the step', async () => {
      const pipeline = new PipelineOrchestrator<Doc>({
        steps: [
          {
            name: 'rinser',
            run: async (doc) => doc,
            summarize: () => {
              throw new Error('no summary');
            },
          },
        ],
      });

      const run = await pipeline.execute({ trail: [] });

      expect(run.status).toBe('completed');
      expect(run.steps[0].outputSummary).toBeNull();
    });
  });

  describe('progress', () => {
    it('should report each stage in order', async () => {
      const pipeline = new PipelineOrchestrator({ steps: fourSteps(), optionalStep: 'formatter' });
      const updates: PipelineProgress[] = [];

      await pipeline.execute({ trail: [] }, { skipOptional: true, onProgress: (p) => { updates.push(p); } });

      expect(updates.map((p) => [p.message, p.stepsCompleted, p.percent])).toEqual([
        ['Starting pipeline execution', 0, 0],
        ['Running rinser step', 0, 0],
        ['Rinser step completed', 1, 25],
        ['Running analyzer step', 1, 25],
        ['Analyzer step completed', 2, 50],
        ['Running creator step', 2, 50],
        ['Creator step completed', 3, 75],
        ['Skipped formatter step', 4, 100],
        ['Pipeline completed', 4, 100],
      ]);
      expect(updates[updates.length - 1]).toMatchObject({ status: 'completed', currentStep: null, stepsTotal: 4 });
    });

    it('should report a failed run', async () => {
      const pipeline = new PipelineOrchestrator<Doc>({ steps: [append('rinser'), failing('analyzer', 'boom')] });
      const updates: PipelineProgress[] = [];

      await pipeline.execute({ trail: [] }, { onProgress: (p) => { updates.push(p); } });

      expect(updates[updates.length - 1]).toMatchObject({
        message: 'Pipeline failed',
        status: 'failed',
        currentStep: 'analyzer',
        stepsCompleted: 1,
        percent: 50,
      });
    });

    it('should not let a throwing callback stop the run', async () => {
      const pipeline = new PipelineOrchestrator({ steps: fourSteps() });
      const callback = vi.fn(() => {
        throw new Error('ui disconnected');
      });

      const run = await pipeline.execute({ trail: [] }, { onProgress: callback });

      expect(run.status).toBe('completed');
      expect(callback).toHaveBeenCalledTimes(10);
    });

    it('should not let a rejecting async callback stop the run', async () => {
      const pipeline = new PipelineOrchestrator({ steps: fourSteps() });

      const run = await pipeline.execute({ trail: [] }, {
        onProgress: async () => {
          throw new Error('socket closed');
        },
      });

      expect(run.status).toBe('completed');
    });
  });

  describe('events', () => {
    it('should emit step and run events', async () => {
      const pipeline = new PipelineOrchestrator<Doc>({ steps: [append('rinser'), failing('analyzer', 'boom')] });
      const started = vi.fn();
      const completed = vi.fn();
      const failed = vi.fn();
      const finished = vi.fn();
      pipeline.on('step:started', started);
      pipeline.on('step:completed', completed);
      pipeline.on('step:failed', failed);
      pipeline.on('run:completed', finished);

      const run = await pipeline.execute({ trail: [] }, { runId: 'run-1' });

      expect(started.mock.calls).toEqual([
        ['run-1', 'rinser'],
        ['run-1', 'analyzer'],
      ]);
      expect(completed).toHaveBeenCalledWith('run-1', run.steps[0]);
      expect(failed).toHaveBeenCalledWith('run-1', run.steps[1]);
      expect(finished).toHaveBeenCalledWith(run);
    });

    it('should survive a throwing listener', async () => {
      const pipeline = new PipelineOrchestrator({ steps: fourSteps() });
      pipeline.on('progress', () => {
        throw new Error('listener bug');
      });

      const run = await pipeline.execute({ trail: [] });

      expect(run.status).toBe('completed');
    });
  });
});

describe('createRunId', () => {
  it('should return distinct eight-character ids', () => {
    const a = createRunId();
    const b = createRunId();

    expect(a).toMatch(/^[0-9a-f]{8}$/);
    expect(a).not.toBe(b);
  });
});
