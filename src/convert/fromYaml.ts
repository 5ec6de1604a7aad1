import { isRequiredDependency, type CurseForgeClient } from '../clients/curseforge.js';
import { encodeFileName, fileNameFromUrl } from '../clients/urls.js';
import { IntegrityError } from '../errors.js';
import type { CurseModFileInfo, NixManifest, ResolvedMod, YamlManifest, YamlMod, YamlModFile } from '../types/index.js';
import { byName } from '../utils/sort.js';
import { resolveAll, type ResolveOptions } from './resolveAll.js';

/**
 * Resolves every mod of the YAML manifest against the catalog (project,
 * file, hashes, required dependencies) to produce the Nix manifest.
 */
export async function generateNixFromYaml(
  manifest: YamlManifest,
  client: CurseForgeClient,
  options: ResolveOptions = {},
): Promise<NixManifest> {
  options.logger?.(`Resolving ${manifest.mods.length} mods for Minecraft ${manifest.version}`);

  const mods = await resolveAll(
    manifest.mods,
    (mod) => `mod ${mod.name}`,
    (mod) => resolveMod(mod, manifest.version, client, options),
    options,
  );

  return {
    version: manifest.version,
    imports: manifest.imports,
    mods: mods.sort(byName),
  };
}

export async function resolveMod(
  mod: YamlMod,
  gameVersion: string,
  client: CurseForgeClient,
  options: ResolveOptions = {},
): Promise<ResolvedMod> {
  const [pin, ...ignored] = mod.files ?? [];
  if (ignored.length > 0) {
    options.logger?.(`${mod.name}: using the first of ${ignored.length + 1} file entries`);
  }

  const flags = {
    side: mod.side ?? 'both',
    required: mod.required ?? true,
    default: mod.default ?? true,
  } as const;

  if (pin?.src) {
    const info = verified(await client.getRemoteFileInfo(pin.src), pin, mod.name);
    const filename = pin.name ?? fileNameFromUrl(info.downloadUrl);
    return {
      title: mod.name,
      name: mod.name,
      ...flags,
      deps: [],
      filename,
      encoded: encodeFileName(filename),
      page: pin.filePageUrl ?? pin.src,
      src: info.downloadUrl,
      type: 'remote',
      md5: info.md5,
      sha256: info.sha256,
      size: info.size,
    };
  }

  const addon = await client.findBySlug(mod.name);
  const file =
    pin?.id !== undefined
      ? await client.getFile(addon.id, pin.id)
      : await client.latestFile(addon.id, gameVersion, pin?.maturity ?? 'release');
  const info = verified(await client.getFileInfo(file), pin, mod.name);

  const depIds = [...new Set(file.dependencies.filter((dep) => isRequiredDependency(dep.relationType)).map((dep) => dep.modId))];
  const deps = await Promise.all(depIds.map(async (id) => (await client.getAddonInfo(id)).slug));

  return {
    title: addon.name,
    name: mod.name,
    id: addon.id,
    ...flags,
    deps: deps.sort(),
    filename: file.fileName,
    encoded: encodeFileName(file.fileName),
    page: pin?.filePageUrl ?? `${addon.websiteUrl}/files/${file.id}`,
    src: info.downloadUrl,
    type: 'remote',
    md5: info.md5,
    sha256: info.sha256,
    size: info.size,
  };
}

function verified(info: CurseModFileInfo, pin: YamlModFile | undefined, name: string): CurseModFileInfo {
  if (pin?.md5 && pin.md5.toLowerCase() !== info.md5) {
    throw new IntegrityError(`${name}: expected md5 ${pin.md5}, downloaded file has ${info.md5}`);
  }
  return info;
}
