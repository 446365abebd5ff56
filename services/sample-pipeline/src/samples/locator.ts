import { promises as fs, type Dirent } from 'node:fs';
import path from 'node:path';
import { PipelineError } from '../errors';
import type { Logger } from '../observability/logger';

export interface SampleLocatorOptions {
  domainTaskSuffix: string;
  artifactExtensions: readonly string[];
  logger: Logger;
}

const QUESTIONS_SUBPATH = path.join('data', 'questions');
const STAGING_PREFIX = '.staging-';

async function pathExists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

async function listDirectories(dir: string): Promise<Dirent[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries.filter((entry) => entry.isDirectory());
}

function lastInteger(name: string): bigint | null {
  const matches = name.match(/\d+/g);
  if (!matches || matches.length === 0) {
    return null;
  }
  return BigInt(matches[matches.length - 1]);
}

function compareNames(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

/** Orders by the trailing integer in the name; names without digits sort last. */
export function compareSampleNames(left: string, right: string): number {
  const leftNumber = lastInteger(left);
  const rightNumber = lastInteger(right);
  if (leftNumber !== null && rightNumber !== null && leftNumber !== rightNumber) {
    return leftNumber < rightNumber ? -1 : 1;
  }
  if (leftNumber === null && rightNumber !== null) {
    return 1;
  }
  if (leftNumber !== null && rightNumber === null) {
    return -1;
  }
  return compareNames(left, right);
}

export class SampleLocator {
  private readonly suffix: string;
  private readonly extensions: Set<string>;
  private readonly logger: Logger;

  constructor(options: SampleLocatorOptions) {
    this.suffix = options.domainTaskSuffix;
    this.extensions = new Set(options.artifactExtensions.map((ext) => ext.toLowerCase()));
    this.logger = options.logger.child({ component: 'locator' });
  }

  /**
   * Resolves the directory holding domain-task directories: `data/questions`
   * when the generator wrote one, otherwise the output root itself.
   */
  async findQuestionsDirectory(outputDir: string): Promise<string> {
    if (!(await pathExists(outputDir))) {
      throw new PipelineError(`Generator output directory not found: ${outputDir}`, 'NOT_FOUND', { outputDir });
    }
    const questionsDir = path.join(outputDir, QUESTIONS_SUBPATH);
    const root = (await pathExists(questionsDir)) ? questionsDir : outputDir;
    const domainTaskDirs = await this.findDomainTaskDirectories(root);
    if (domainTaskDirs.length === 0) {
      throw new PipelineError(`No domain task directories found in ${root}`, 'NOT_FOUND', {
        outputDir,
        suffix: this.suffix
      });
    }
    return root;
  }

  async findDomainTaskDirectories(root: string): Promise<string[]> {
    const found: string[] = [];
    const walk = async (dir: string): Promise<void> => {
      for (const entry of await listDirectories(dir)) {
        const absolute = path.join(dir, entry.name);
        if (entry.name.endsWith(this.suffix)) {
          found.push(absolute);
          continue;
        }
        await walk(absolute);
      }
    };
    await walk(root);
    return found.sort(compareNames);
  }

  async containsArtifact(dir: string): Promise<boolean> {
    const entries = await fs.readdir(dir, { withFileTypes: true });
    for (const entry of entries) {
      const absolute = path.join(dir, entry.name);
      if (entry.isFile() && this.extensions.has(path.extname(entry.name).toLowerCase())) {
        return true;
      }
      if (entry.isDirectory() && (await this.containsArtifact(absolute))) {
        return true;
      }
    }
    return false;
  }

  /**
   * Returns the sample directories of one domain-task directory in generator
   * order. Candidates without any artifact file are deleted.
   */
  async listAcceptedSamples(domainTaskDir: string): Promise<string[]> {
    const accepted: string[] = [];
    for (const entry of await listDirectories(domainTaskDir)) {
      const candidate = path.join(domainTaskDir, entry.name);
      if (await this.containsArtifact(candidate)) {
        accepted.push(entry.name);
        continue;
      }
      this.logger.warn('Removing empty sample directory', { sample: entry.name, domainTaskDir });
      await fs.rm(candidate, { recursive: true, force: true });
    }
    return accepted.sort(compareSampleNames);
  }

  /**
   * Renames accepted samples to `startIndex + i` in sorted order and returns
   * the new ids. Renames go through staging names so a target id that
   * matches another candidate's original name never collides.
   */
  async renameSamples(domainTaskDir: string, startIndex: number): Promise<string[]> {
    const accepted = await this.listAcceptedSamples(domainTaskDir);
    const staged: string[] = [];
    for (const [index, name] of accepted.entries()) {
      const stagingName = `${STAGING_PREFIX}${index}`;
      await fs.rename(path.join(domainTaskDir, name), path.join(domainTaskDir, stagingName));
      staged.push(stagingName);
    }

    const sampleIds: string[] = [];
    for (const [index, stagingName] of staged.entries()) {
      const sampleId = String(startIndex + index);
      await fs.rename(path.join(domainTaskDir, stagingName), path.join(domainTaskDir, sampleId));
      sampleIds.push(sampleId);
    }

    this.logger.info('Assigned sample ids', {
      domainTaskDir,
      count: sampleIds.length,
      first: sampleIds[0] ?? null,
      last: sampleIds[sampleIds.length - 1] ?? null
    });
    return sampleIds;
  }

  /** Unrenamed sample directories across every domain-task directory of an output tree. */
  async collectGeneratedSamples(outputDir: string): Promise<string[]> {
    const root = await this.findQuestionsDirectory(outputDir);
    const samples: string[] = [];
    for (const domainTaskDir of await this.findDomainTaskDirectories(root)) {
      const names = await this.listAcceptedSamples(domainTaskDir);
      samples.push(...names.map((name) => path.join(domainTaskDir, name)));
    }
    return samples;
  }
}
