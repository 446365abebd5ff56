import { createReadStream, promises as fs } from 'node:fs';
import path from 'node:path';
import * as tar from 'tar';
import { PipelineError, assertUnreachable, describeError } from '../errors';
import type { Logger } from '../observability/logger';
import type { OutputFormat, UploadedSample } from '../tasks/types';
import { contentTypeFor, type ObjectStore } from './objectStore';

export interface SampleUploaderOptions {
  store: ObjectStore;
  prefix: string;
  logger: Logger;
}

export type UploadSamplesInput = {
  domainTaskDir: string;
  sampleIds: readonly string[];
  taskType: string;
  outputFormat: OutputFormat;
  bucket: string;
};

export type UploadSamplesResult = {
  uploaded: UploadedSample[];
  tarFile: string | null;
};

type SampleFiles = {
  files: string[];
  skipped: string[];
};

/**
 * Lists uploadable files under `root` as '/'-separated relative paths.
 * Symlinks are followed when they resolve to a regular file; anything else
 * is reported in `skipped`.
 */
async function listFiles(root: string, relative = ''): Promise<SampleFiles> {
  const entries = await fs.readdir(path.join(root, relative), { withFileTypes: true });
  const result: SampleFiles = { files: [], skipped: [] };
  for (const entry of entries) {
    const entryPath = relative ? `${relative}/${entry.name}` : entry.name;
    if (entry.isDirectory()) {
      const nested = await listFiles(root, entryPath);
      result.files.push(...nested.files);
      result.skipped.push(...nested.skipped);
    } else if (entry.isFile()) {
      result.files.push(entryPath);
    } else if (entry.isSymbolicLink() && (await resolvesToFile(path.join(root, entryPath)))) {
      result.files.push(entryPath);
    } else {
      result.skipped.push(entryPath);
    }
  }
  result.files.sort();
  result.skipped.sort();
  return result;
}

async function resolvesToFile(linkPath: string): Promise<boolean> {
  try {
    return (await fs.stat(linkPath)).isFile();
  } catch {
    return false;
  }
}

/**
 * Streams sample directories to the object store, deleting every file as
 * soon as its PUT resolves so local usage stays near one sample at a time.
 */
export class SampleUploader {
  private readonly store: ObjectStore;
  private readonly prefix: string;
  private readonly logger: Logger;

  constructor(options: SampleUploaderOptions) {
    this.store = options.store;
    this.prefix = options.prefix.replace(/^\/+/, '').replace(/\/+$/, '');
    this.logger = options.logger.child({ component: 'uploader' });
  }

  buildKey(taskType: string, ...segments: string[]): string {
    return [this.prefix, taskType, ...segments].filter((segment) => segment.length > 0).join('/');
  }

  async uploadSamples(input: UploadSamplesInput): Promise<UploadSamplesResult> {
    let tarFile: string | null = null;
    switch (input.outputFormat) {
      case 'tar':
        tarFile = await this.uploadArchive(input);
        break;
      case 'files':
        break;
      default:
        assertUnreachable(input.outputFormat);
    }

    const uploaded: UploadedSample[] = [];
    for (const sampleId of input.sampleIds) {
      const sampleDir = path.join(input.domainTaskDir, sampleId);
      const filesUploaded = await this.uploadSampleDirectory(sampleDir, sampleId, input);
      await fs.rm(sampleDir, { recursive: true, force: true });
      uploaded.push({ sample_id: sampleId, files_uploaded: filesUploaded });
      this.logger.info('Uploaded sample', { sampleId, filesUploaded, taskType: input.taskType });
    }

    return { uploaded, tarFile };
  }

  private async uploadSampleDirectory(sampleDir: string, sampleId: string, input: UploadSamplesInput): Promise<number> {
    const { files, skipped } = await listFiles(sampleDir);
    if (skipped.length > 0) {
      this.logger.warn('Dropping entries that are not regular files', { sampleId, entries: skipped });
    }
    for (const relativePath of files) {
      const filePath = path.join(sampleDir, relativePath);
      const key = this.buildKey(input.taskType, sampleId, relativePath);
      await this.transferFile(filePath, input.bucket, key);
      await fs.rm(filePath, { force: true });
    }
    return files.length;
  }

  private async uploadArchive(input: UploadSamplesInput): Promise<string | null> {
    if (input.sampleIds.length === 0) {
      return null;
    }
    const firstId = input.sampleIds[0];
    const lastId = input.sampleIds[input.sampleIds.length - 1];
    const archiveName = `${input.taskType}_${firstId}-${lastId}.tar.gz`;
    const archivePath = path.join(path.dirname(input.domainTaskDir), archiveName);

    await tar.create(
      {
        gzip: true,
        cwd: input.domainTaskDir,
        file: archivePath,
        portable: true
      },
      [...input.sampleIds]
    );

    const key = this.buildKey(input.taskType, 'archives', archiveName);
    try {
      await this.transferFile(archivePath, input.bucket, key);
    } finally {
      await fs.rm(archivePath, { force: true });
    }
    this.logger.info('Uploaded sample archive', { key, samples: input.sampleIds.length });
    return key;
  }

  private async transferFile(filePath: string, bucket: string, key: string): Promise<void> {
    const stats = await fs.stat(filePath);
    const body = createReadStream(filePath);
    try {
      await this.store.putObject({
        bucket,
        key,
        body,
        contentLength: stats.size,
        contentType: contentTypeFor(path.extname(filePath))
      });
    } catch (err) {
      throw new PipelineError(
        `Failed to upload ${filePath} to ${bucket}/${key}: ${describeError(err)}`,
        'STORAGE_FAILED',
        { bucket, key },
        { cause: err }
      );
    } finally {
      body.destroy();
    }
    this.logger.debug('Uploaded object', { bucket, key, sizeBytes: stats.size });
  }
}
