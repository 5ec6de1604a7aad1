#!/usr/bin/env node
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { SqliteCache } from './cache/sqliteCache.js';
import { CachedFetcher } from './clients/fetcher.js';
import { CurseForgeClient } from './clients/curseforge.js';
import { APP_NAME, parsePositiveInteger, resolveApiKey, resolveCacheDirectory } from './config.js';
import { generateYamlFromCurse } from './convert/fromCurse.js';
import { generateNixFromYaml } from './convert/fromYaml.js';
import { DEFAULT_CONCURRENCY, type ResolveOptions } from './convert/resolveAll.js';
import { describeError } from './errors.js';
import { readCurseManifest } from './manifest/curse.js';
import { serializeNixManifest } from './manifest/nix.js';
import { readYamlManifest, serializeYamlManifest } from './manifest/yaml.js';
import { createDebugLogger, createLogger, setVerbose } from './utils/logger.js';
import { describeAge, epochSecondsNow, epochToIso } from './utils/time.js';

dotenv.config();

interface RawCommonOptions {
  cacheDir?: string;
  concurrency?: string;
  apiKeyFile?: string;
  skipFailures?: boolean;
  verbose?: boolean;
}

interface CatalogContext {
  cache: SqliteCache;
  client: CurseForgeClient;
  resolve: ResolveOptions;
}

const program = new Command();
program
  .name(APP_NAME)
  .description('Convert Minecraft modpack manifests between Curse JSON, editable YAML and Nix.');

configureCommonOptions(
  program
    .command('from-curse')
    .description('Convert a Curse manifest.json into the editable YAML manifest.')
    .argument('<input>', 'Path to the Curse manifest (JSON).')
    .argument('<output>', 'Path to write the YAML manifest.'),
).action(async (input: string, output: string, rawOptions: RawCommonOptions) => {
  await handleFromCurse(input, output, rawOptions);
});

configureCommonOptions(
  program
    .command('from-yaml')
    .description('Resolve a YAML manifest into the Nix manifest.')
    .argument('<input>', 'Path to the YAML manifest.')
    .argument('<output>', 'Path to write the Nix manifest.'),
).action(async (input: string, output: string, rawOptions: RawCommonOptions) => {
  await handleFromYaml(input, output, rawOptions);
});

program
  .command('cache')
  .description('Inspect the response cache.')
  .command('show')
  .description('Print the cached response for a URL.')
  .argument('<url>', 'Request URL, including its query string.')
  .option('--cache-dir <path>', 'Cache directory (default: platform cache directory).')
  .action((url: string, rawOptions: RawCommonOptions) => {
    handleCacheShow(url, rawOptions);
  });

program.parseAsync().catch((error: unknown) => {
  console.error(describeError(error));
  process.exitCode = 1;
});

function configureCommonOptions(command: Command): Command {
  return command
    .option('--cache-dir <path>', 'Cache directory (default: platform cache directory).')
    .option('--concurrency <number>', `Mods resolved in parallel (default ${DEFAULT_CONCURRENCY}).`)
    .option('--api-key-file <path>', 'File holding the CurseForge API key, used when CURSEFORGE_API_KEY is unset.')
    .option('--skip-failures', 'Report mods that fail to resolve and leave them out instead of aborting.')
    .option('-v, --verbose', 'Log every request and cache decision.');
}

async function handleFromCurse(input: string, output: string, rawOptions: RawCommonOptions) {
  const log = createLogger('curse');
  log('Reading manifest...');
  const manifest = await readCurseManifest(path.resolve(input));

  const context = await openCatalog(rawOptions);
  try {
    const yaml = await generateYamlFromCurse(manifest, context.client, { ...context.resolve, logger: log });
    log('Writing manifest...');
    await writeOutput(output, serializeYamlManifest(yaml));
    log(`Wrote ${yaml.mods.length} mods to ${path.resolve(output)}`);
  } finally {
    context.cache.close();
  }
}

async function handleFromYaml(input: string, output: string, rawOptions: RawCommonOptions) {
  const log = createLogger('yaml');
  log('Reading manifest...');
  const manifest = await readYamlManifest(path.resolve(input));

  const context = await openCatalog(rawOptions);
  try {
    const nix = await generateNixFromYaml(manifest, context.client, { ...context.resolve, logger: log });
    log('Writing manifest...');
    await writeOutput(output, serializeNixManifest(nix));
    log(`Wrote ${nix.mods.length} mods to ${path.resolve(output)}`);
  } finally {
    context.cache.close();
  }
}

function handleCacheShow(url: string, rawOptions: RawCommonOptions) {
  const cache = new SqliteCache({ cacheDir: resolveCacheDirectory(rawOptions.cacheDir) });
  try {
    const entry = CachedFetcher.findCached(cache, url);
    if (!entry) {
      console.log(`${CachedFetcher.requestKey(url)} is not cached.`);
      return;
    }
    const age = describeAge(Math.max(0, epochSecondsNow() - entry.fetchedAt));
    console.log(`${entry.key}\nfetched ${epochToIso(entry.fetchedAt)} (${age} ago)\n`);
    console.log(entry.payload);
  } finally {
    cache.close();
  }
}

async function openCatalog(raw: RawCommonOptions): Promise<CatalogContext> {
  setVerbose(raw.verbose ?? false);
  const concurrency = parsePositiveInteger(raw.concurrency, DEFAULT_CONCURRENCY, 'concurrency');
  const apiKey = await resolveApiKey(raw.apiKeyFile);

  const cache = new SqliteCache({
    cacheDir: resolveCacheDirectory(raw.cacheDir),
    logger: createDebugLogger('cache'),
  });
  const fetcher = new CachedFetcher({
    cache,
    headers: { 'x-api-key': apiKey },
    logger: createDebugLogger('fetch'),
  });
  const client = new CurseForgeClient({ fetcher, logger: createDebugLogger('curseforge') });

  return {
    cache,
    client,
    resolve: { concurrency, skipFailures: raw.skipFailures ?? false },
  };
}

async function writeOutput(outputPath: string, contents: string) {
  const resolved = path.resolve(outputPath);
  await fs.mkdir(path.dirname(resolved), { recursive: true });
  await fs.writeFile(resolved, contents, 'utf8');
}
