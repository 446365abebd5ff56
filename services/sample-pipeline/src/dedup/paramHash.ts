import { promises as fs } from 'node:fs';
import path from 'node:path';
import { z } from 'zod';

export const SAMPLE_METADATA_FILE = 'metadata.json';

const metadataSchema = z.object({ param_hash: z.unknown().optional() }).passthrough();

/**
 * Reads `param_hash` from a sample's metadata file. Resolves `null` when the
 * file is absent or carries no usable hash; unparseable JSON rejects.
 */
export async function readParamHash(sampleDir: string): Promise<string | null> {
  const metadataPath = path.join(sampleDir, SAMPLE_METADATA_FILE);
  let raw: string;
  try {
    raw = await fs.readFile(metadataPath, 'utf8');
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === 'ENOENT') {
      return null;
    }
    throw err;
  }

  const parsed = metadataSchema.safeParse(JSON.parse(raw));
  if (!parsed.success) {
    return null;
  }
  const hash = parsed.data.param_hash;
  return typeof hash === 'string' && hash.length > 0 ? hash : null;
}
