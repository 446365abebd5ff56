import { promises as fs } from 'node:fs';
import path from 'node:path';
import { describeError } from '../errors';

export type ReseedOptions = {
  seedMin?: number;
  seedMax?: number;
  backup?: boolean;
  dryRun?: boolean;
  random?: () => number;
};

export type ReseedFileOutcome =
  | { file: string; status: 'updated'; oldSeed: unknown; newSeed: number }
  | { file: string; status: 'skipped'; reason: string };

export type ReseedSummary = {
  total: number;
  updated: number;
  skipped: number;
  files: ReseedFileOutcome[];
};

type MessageBody = Record<string, unknown>;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeBody(raw: unknown): MessageBody | null {
  if (isPlainObject(raw)) {
    return raw;
  }
  if (typeof raw === 'string') {
    try {
      const parsed: unknown = JSON.parse(raw);
      return isPlainObject(parsed) ? parsed : null;
    } catch {
      return null;
    }
  }
  return null;
}

export type SeedBounds = {
  seedMin: number;
  seedMax: number;
};

export function resolveSeedBounds(seedMin = 1, seedMax = 100_000): SeedBounds {
  if (!Number.isInteger(seedMin) || !Number.isInteger(seedMax) || seedMin < 1) {
    throw new Error('seed bounds must be positive integers');
  }
  if (seedMin >= seedMax) {
    throw new Error('seed-min must be less than seed-max');
  }
  return { seedMin, seedMax };
}

export function drawSeed(seedMin: number, seedMax: number, random: () => number = Math.random): number {
  return seedMin + Math.floor(random() * (seedMax - seedMin + 1));
}

async function reseedFile(filePath: string, options: Required<Omit<ReseedOptions, 'random'>> & {
  random: () => number;
}): Promise<ReseedFileOutcome> {
  const file = path.basename(filePath);
  const raw = await fs.readFile(filePath, 'utf8');

  let message: unknown;
  try {
    message = JSON.parse(raw);
  } catch (err) {
    return { file, status: 'skipped', reason: `invalid JSON: ${describeError(err)}` };
  }
  if (!isPlainObject(message) || !('body' in message)) {
    return { file, status: 'skipped', reason: "no 'body' field" };
  }

  const body = decodeBody(message.body);
  if (!body) {
    return { file, status: 'skipped', reason: 'body is not a JSON object' };
  }
  if (!('seed' in body)) {
    return { file, status: 'skipped', reason: "no 'seed' field in body" };
  }

  const oldSeed = body.seed;
  const newSeed = drawSeed(options.seedMin, options.seedMax, options.random);
  if (options.dryRun) {
    return { file, status: 'updated', oldSeed, newSeed };
  }

  if (options.backup) {
    await fs.copyFile(filePath, `${filePath}.bak`);
  }
  const updatedBody = { ...body, seed: newSeed };
  const updatedMessage = {
    ...message,
    body: typeof message.body === 'string' ? JSON.stringify(updatedBody) : updatedBody
  };
  await fs.writeFile(filePath, `${JSON.stringify(updatedMessage, null, 2)}\n`, 'utf8');
  return { file, status: 'updated', oldSeed, newSeed };
}

/**
 * Replaces the `seed` of every dead-lettered task message in `dir`, so a
 * redelivered task generates different content than the attempt that failed.
 */
export async function reseedDeadLetters(dir: string, options: ReseedOptions = {}): Promise<ReseedSummary> {
  const resolved = {
    ...resolveSeedBounds(options.seedMin, options.seedMax),
    backup: options.backup ?? true,
    dryRun: options.dryRun ?? false,
    random: options.random ?? Math.random
  };

  const entries = await fs.readdir(dir, { withFileTypes: true });
  const jsonFiles = entries
    .filter((entry) => entry.isFile() && entry.name.endsWith('.json'))
    .map((entry) => entry.name)
    .sort();

  const files: ReseedFileOutcome[] = [];
  for (const name of jsonFiles) {
    files.push(await reseedFile(path.join(dir, name), resolved));
  }

  const updated = files.filter((outcome) => outcome.status === 'updated').length;
  return { total: files.length, updated, skipped: files.length - updated, files };
}
