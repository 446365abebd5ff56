import { mkdtemp, mkdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';
import type { Readable } from 'node:stream';
import type { FailedJobSource, FailedTaskJob } from '../src/deadLetters/redrive';
import type { GenerationRequest, SampleGenerator } from '../src/generator/runner';
import type { Logger, LogMeta } from '../src/observability/logger';
import type { ObjectStore, PutObjectInput } from '../src/storage/objectStore';
import type { TaskMessage } from '../src/tasks/types';

export type LogEntry = { level: string; message: string; meta?: LogMeta };

export function createRecordingLogger(entries: LogEntry[] = [], base: LogMeta = {}): Logger {
  const record = (level: string) => (message: string, meta?: LogMeta) => {
    entries.push({ level, message, meta: { ...base, ...meta } });
  };
  return {
    debug: record('debug'),
    info: record('info'),
    warn: record('warn'),
    error: record('error'),
    child: (meta) => createRecordingLogger(entries, { ...base, ...meta })
  };
}

export const silentLogger = createRecordingLogger();

export async function createTempDir(prefix = 'sample-pipeline-'): Promise<string> {
  return mkdtemp(path.join(tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export type SampleSpec = {
  name: string;
  files?: Record<string, string>;
  paramHash?: string;
};

/** Writes sample directories below `<outputDir>/data/questions/<domainTask>`. */
export async function writeSamples(outputDir: string, domainTask: string, samples: SampleSpec[]): Promise<string> {
  const domainTaskDir = path.join(outputDir, 'data', 'questions', domainTask);
  await mkdir(domainTaskDir, { recursive: true });
  for (const sample of samples) {
    const sampleDir = path.join(domainTaskDir, sample.name);
    await mkdir(sampleDir, { recursive: true });
    const files = sample.files ?? { 'image.png': `png:${sample.name}` };
    for (const [relative, contents] of Object.entries(files)) {
      const target = path.join(sampleDir, relative);
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, contents);
    }
    if (sample.paramHash !== undefined) {
      await writeFile(path.join(sampleDir, 'metadata.json'), JSON.stringify({ param_hash: sample.paramHash }));
    }
  }
  return domainTaskDir;
}

export type GeneratorCall = { request: GenerationRequest; outputDir: string };

export type GeneratorBehaviour = (call: GeneratorCall, callIndex: number) => Promise<void>;

/** Generator stand-in that records each call and delegates writing to `behaviour`. */
export class FakeGenerator implements SampleGenerator {
  readonly calls: GeneratorCall[] = [];

  constructor(private readonly behaviour: GeneratorBehaviour) {}

  async run(request: GenerationRequest, outputDir: string): Promise<void> {
    const call = { request: { ...request }, outputDir };
    this.calls.push(call);
    await this.behaviour(call, this.calls.length - 1);
  }
}

export type StoredObject = {
  bucket: string;
  key: string;
  body: Buffer;
  contentLength: number;
  contentType?: string;
};

async function readStream(stream: Readable): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks);
}

export class InMemoryObjectStore implements ObjectStore {
  readonly objects: StoredObject[] = [];
  failOnKey: ((key: string) => boolean) | null = null;

  async putObject(input: PutObjectInput): Promise<void> {
    const body = await readStream(input.body);
    if (this.failOnKey?.(input.key)) {
      throw new Error(`simulated failure for ${input.key}`);
    }
    this.objects.push({
      bucket: input.bucket,
      key: input.key,
      body,
      contentLength: input.contentLength,
      contentType: input.contentType
    });
  }

  keys(): string[] {
    return this.objects.map((object) => object.key);
  }

  get(key: string): StoredObject | undefined {
    return this.objects.find((object) => object.key === key);
  }
}

export async function readJson(filePath: string): Promise<unknown> {
  return JSON.parse(await readFile(filePath, 'utf8'));
}

export function sequenceRandom(values: number[]): () => number {
  let index = 0;
  return () => {
    const value = values[index % values.length];
    index += 1;
    return value;
  };
}

/** Stand-in for a job in BullMQ's failed set. */
export class StubFailedJob implements FailedTaskJob {
  retried = false;

  constructor(
    readonly id: string,
    public data: TaskMessage,
    private readonly retryError: Error | null = null
  ) {}

  async updateData(data: TaskMessage): Promise<void> {
    this.data = data;
  }

  async retry(): Promise<void> {
    if (this.retryError) {
      throw this.retryError;
    }
    this.retried = true;
  }
}

/** Serves `jobs` the way `Queue.getFailed` slices its range, `end` inclusive. */
export class StubFailedJobSource implements FailedJobSource {
  readonly ranges: Array<[number, number]> = [];
  closed = false;

  constructor(readonly jobs: StubFailedJob[]) {}

  async getFailedJobs(start: number, end: number): Promise<FailedTaskJob[]> {
    this.ranges.push([start, end]);
    return this.jobs.slice(start, end + 1);
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}
