import { afterEach, beforeEach, describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { PipelineError } from '../src/errors';
import { createNoopMetrics } from '../src/observability/metrics';
import { extractTaskMessages, handleInvocation } from '../src/pipeline/handler';
import { TaskProcessor } from '../src/pipeline/processor';
import { SampleLocator } from '../src/samples/locator';
import { SampleUploader } from '../src/storage/uploader';
import { FakeGenerator, InMemoryObjectStore, createTempDir, removeDir, silentLogger, writeSamples } from './helpers';

function isValidationError(err: unknown): boolean {
  return err instanceof PipelineError && err.code === 'VALIDATION_FAILED';
}

describe('extractTaskMessages', () => {
  it('parses each record body of a batch event', () => {
    const tasks = extractTaskMessages({
      Records: [
        { messageId: 'm-1', body: JSON.stringify({ type: 'shapes', num_samples: 2 }) },
        { messageId: 'm-2', body: JSON.stringify({ type: 'mazes', num_samples: 1, start_index: 4 }) }
      ]
    });
    assert.deepEqual(
      tasks.map((task) => [task.type, task.num_samples, task.start_index]),
      [
        ['shapes', 2, 0],
        ['mazes', 1, 4]
      ]
    );
  });

  it('treats an event without Records as a single task', () => {
    const [task] = extractTaskMessages({ type: 'shapes', num_samples: 1, seed: 3 });
    assert.equal(task.seed, 3);
  });

  it('rejects a record whose body is not JSON', () => {
    assert.throws(() => extractTaskMessages({ Records: [{ body: '{not json' }] }), isValidationError);
  });
});

describe('handleInvocation', () => {
  let root: string;

  beforeEach(async () => {
    root = await createTempDir();
  });

  afterEach(async () => {
    await removeDir(root);
  });

  function createProcessor(generator: FakeGenerator): TaskProcessor {
    return new TaskProcessor({
      settings: { scratchRoot: root, defaultBucket: 'test-bucket', maxRounds: 3, throttleRetries: 3, backoffBaseMs: 1 },
      generator,
      locator: new SampleLocator({ domainTaskSuffix: '_task', artifactExtensions: ['.png'], logger: silentLogger }),
      uploader: new SampleUploader({ store: new InMemoryObjectStore(), prefix: 'data/v1', logger: silentLogger }),
      registry: null,
      metrics: createNoopMetrics(),
      logger: silentLogger,
      processId: 1
    });
  }

  it('validates every record before running any task', async () => {
    const generator = new FakeGenerator(async ({ outputDir }) => {
      await writeSamples(outputDir, 'shapes_task', [{ name: 's0' }]);
    });

    await assert.rejects(
      handleInvocation(
        {
          Records: [
            { body: JSON.stringify({ type: 'shapes', num_samples: 1 }) },
            { body: JSON.stringify({ type: 'shapes', num_samples: -1 }) }
          ]
        },
        createProcessor(generator)
      ),
      isValidationError
    );
    assert.equal(generator.calls.length, 0);
  });

  it('processes records in order and returns their results', async () => {
    const generator = new FakeGenerator(async ({ request, outputDir }) => {
      await writeSamples(
        outputDir,
        'shapes_task',
        Array.from({ length: request.numSamples }, (_, index) => ({ name: `s${index}` }))
      );
    });

    const response = await handleInvocation(
      {
        Records: [
          { body: JSON.stringify({ type: 'shapes', num_samples: 2, start_index: 0 }) },
          { body: JSON.stringify({ type: 'mazes', num_samples: 1, start_index: 2 }) }
        ]
      },
      createProcessor(generator)
    );

    assert.equal(response.status, 'ok');
    assert.equal(response.processed, 2);
    assert.deepEqual(
      response.results.map((result) => [result.generator, [...result.sample_ids]]),
      [
        ['shapes', ['0', '1']],
        ['mazes', ['2']]
      ]
    );
  });

  it('rethrows the first task failure so the batch is redelivered', async () => {
    const generator = new FakeGenerator(async () => {
      throw new PipelineError('Generator shapes failed: exit code 2', 'GENERATOR_FAILED');
    });

    await assert.rejects(
      handleInvocation({ type: 'shapes', num_samples: 1 }, createProcessor(generator)),
      (err: unknown) => err instanceof PipelineError && err.code === 'GENERATOR_FAILED'
    );
  });
});
