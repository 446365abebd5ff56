import { spawn } from 'node:child_process';
import { promises as fs } from 'node:fs';
import path from 'node:path';
import { PipelineError } from '../errors';
import type { Logger } from '../observability/logger';

export type GenerationRequest = {
  type: string;
  numSamples: number;
  seed?: number | null;
};

/** Produces a sample tree for a request under `outputDir`. */
export interface SampleGenerator {
  run(request: GenerationRequest, outputDir: string): Promise<void>;
}

export interface GeneratorRunnerOptions {
  generatorsPath: string;
  command: string;
  entry: string;
  logger: Logger;
}

const OUTPUT_TAIL_LENGTH = 4_000;

function tail(output: string): string {
  return output.length > OUTPUT_TAIL_LENGTH ? output.slice(-OUTPUT_TAIL_LENGTH) : output;
}

function collectProcessOutput(
  command: string,
  args: string[],
  options: { cwd: string }
): Promise<{ exitCode: number | null; stdout: string; stderr: string; spawnError: Error | null }> {
  return new Promise((resolve) => {
    const child = spawn(command, args, {
      cwd: options.cwd,
      env: process.env
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    const settle = (exitCode: number | null, spawnError: Error | null) => {
      if (settled) {
        return;
      }
      settled = true;
      resolve({ exitCode, stdout, stderr, spawnError });
    };

    child.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });

    child.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });

    child.on('error', (err) => {
      settle(null, err);
    });

    child.on('close', (code) => {
      settle(code, null);
    });
  });
}

export class GeneratorRunner implements SampleGenerator {
  private readonly logger: Logger;

  constructor(private readonly options: GeneratorRunnerOptions) {
    this.logger = options.logger.child({ component: 'generator' });
  }

  buildArgs(request: GenerationRequest, outputDir: string): string[] {
    const args = [this.options.entry, '--num-samples', String(request.numSamples)];
    if (request.seed !== undefined && request.seed !== null) {
      args.push('--seed', String(request.seed));
    }
    args.push('--output', outputDir);
    return args;
  }

  async run(request: GenerationRequest, outputDir: string): Promise<void> {
    const generatorPath = path.join(this.options.generatorsPath, request.type);
    const stats = await fs.stat(generatorPath).catch((err: NodeJS.ErrnoException) => {
      if (err.code === 'ENOENT') {
        return null;
      }
      throw err;
    });
    if (!stats || !stats.isDirectory()) {
      throw new PipelineError(`Generator not found: ${request.type} at ${generatorPath}`, 'NOT_FOUND', {
        generator: request.type,
        generatorPath
      });
    }

    const args = this.buildArgs(request, outputDir);
    this.logger.info('Running generator', {
      generator: request.type,
      command: [this.options.command, ...args].join(' '),
      cwd: generatorPath
    });

    const result = await collectProcessOutput(this.options.command, args, { cwd: generatorPath });
    if (result.stdout.trim()) {
      this.logger.debug('Generator stdout', { generator: request.type, output: tail(result.stdout) });
    }
    if (result.stderr.trim()) {
      this.logger.info('Generator stderr', { generator: request.type, output: tail(result.stderr) });
    }

    if (result.spawnError || result.exitCode !== 0) {
      const reason = result.spawnError ? result.spawnError.message : `exit code ${result.exitCode}`;
      throw new PipelineError(`Generator ${request.type} failed: ${reason}`, 'GENERATOR_FAILED', {
        generator: request.type,
        exitCode: result.exitCode,
        stderr: tail(result.stderr)
      }, { cause: result.spawnError ?? undefined });
    }
  }
}
