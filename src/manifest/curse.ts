import { promises as fs } from 'node:fs';
import { ManifestError } from '../errors.js';
import { jot } from '../jot.js';
import type { CurseManifest } from '../types/index.js';

const curseManifestNode = jot.object({
  minecraft: jot.object({
    version: jot.string({ nonEmpty: true }),
    modLoaders: jot.optional(
      jot.array(
        jot.object({
          id: jot.string(),
          primary: jot.optional(jot.boolean()),
        }),
      ),
    ),
  }),
  name: jot.optional(jot.string()),
  version: jot.optional(jot.string()),
  author: jot.optional(jot.string()),
  files: jot.array(
    jot.object({
      projectID: jot.integer(),
      fileID: jot.integer(),
      required: jot.boolean(),
    }),
  ),
});

export function parseCurseManifest(text: string, source: string = 'manifest.json'): CurseManifest {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    throw new ManifestError(source, 'not valid JSON', { cause: error });
  }

  try {
    return curseManifestNode.parse(raw, 'manifest');
  } catch (error) {
    throw new ManifestError(source, error instanceof Error ? error.message : String(error), { cause: error });
  }
}

export async function readCurseManifest(filePath: string): Promise<CurseManifest> {
  return parseCurseManifest(await readManifestFile(filePath), filePath);
}

export async function readManifestFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      throw new ManifestError(filePath, 'file not found');
    }
    throw error;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
