import { parse, stringify } from 'yaml';
import { ManifestError } from '../errors.js';
import { jot } from '../jot.js';
import type { YamlManifest, YamlMod, YamlModFile } from '../types/index.js';
import { readManifestFile } from './curse.js';

const yamlModFileNode = jot.object(
  {
    name: jot.optional(jot.string()),
    id: jot.optional(jot.integer()),
    maturity: jot.optional(jot.enum(['release', 'beta', 'alpha'] as const)),
    filePageUrl: jot.optional(jot.string()),
    src: jot.optional(jot.string({ nonEmpty: true })),
    md5: jot.optional(jot.string()),
  },
  { strict: true },
);

const yamlModNode = jot.object(
  {
    name: jot.string({ nonEmpty: true }),
    side: jot.optional(jot.enum(['client', 'server', 'both'] as const)),
    required: jot.optional(jot.boolean()),
    default: jot.optional(jot.boolean()),
    files: jot.optional(jot.array(yamlModFileNode)),
  },
  { strict: true },
);

const yamlManifestNode = jot.object(
  {
    version: jot.string({ nonEmpty: true }),
    imports: jot.optional(jot.array(jot.string())),
    mods: jot.array(yamlModNode),
  },
  { strict: true },
);

export function parseYamlManifest(text: string, source: string = 'manifest.yaml'): YamlManifest {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (error) {
    throw new ManifestError(source, 'not valid YAML', { cause: error });
  }

  const manifest = validate(raw, source);

  const seen = new Set<string>();
  for (const mod of manifest.mods) {
    if (seen.has(mod.name)) {
      throw new ManifestError(source, `mod "${mod.name}" is listed twice`);
    }
    seen.add(mod.name);
  }

  return { version: manifest.version, imports: manifest.imports ?? [], mods: manifest.mods };
}

function validate(raw: unknown, source: string) {
  try {
    return yamlManifestNode.parse(raw, 'manifest');
  } catch (error) {
    throw new ManifestError(source, error instanceof Error ? error.message : String(error), { cause: error });
  }
}

export async function readYamlManifest(filePath: string): Promise<YamlManifest> {
  return parseYamlManifest(await readManifestFile(filePath), filePath);
}

/** Serializes with a stable key order, leaving out every field that is not set. */
export function serializeYamlManifest(manifest: YamlManifest): string {
  return stringify({
    version: manifest.version,
    imports: manifest.imports,
    mods: manifest.mods.map(compactMod),
  });
}

function compactMod(mod: YamlMod): Record<string, unknown> {
  return compact({
    name: mod.name,
    side: mod.side,
    required: mod.required,
    default: mod.default,
    files: mod.files?.map(compactFile),
  });
}

function compactFile(file: YamlModFile): Record<string, unknown> {
  return compact({
    name: file.name,
    id: file.id,
    maturity: file.maturity,
    filePageUrl: file.filePageUrl,
    src: file.src,
    md5: file.md5,
  });
}

function compact(record: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(record).filter(([, value]) => value !== undefined));
}
