import type { CurseForgeClient } from '../clients/curseforge.js';
import type { CurseManifest, YamlManifest, YamlMod } from '../types/index.js';
import { byName } from '../utils/sort.js';
import { resolveAll, type ResolveOptions } from './resolveAll.js';

/**
 * Turns a Curse manifest into the editable YAML form: one entry per file,
 * named by the project's slug and pinned to the listed file id.
 */
export async function generateYamlFromCurse(
  manifest: CurseManifest,
  client: CurseForgeClient,
  options: ResolveOptions = {},
): Promise<YamlManifest> {
  options.logger?.(`Found ${manifest.files.length} mods in Curse manifest`);

  const mods = await resolveAll(
    manifest.files,
    (file) => `file ${file.fileID} in project ${file.projectID}`,
    async (file) => {
      const addon = await client.getAddonInfo(file.projectID);
      const mod: YamlMod = { name: addon.slug, files: [{ id: file.fileID }] };
      if (!file.required) {
        mod.required = false;
      }
      return mod;
    },
    options,
  );

  return {
    version: manifest.minecraft.version,
    imports: [],
    mods: mergeBySlug(mods).sort(byName),
  };
}

/** A project listed with several files becomes one entry holding all of them. */
function mergeBySlug(mods: YamlMod[]): YamlMod[] {
  const merged = new Map<string, YamlMod>();
  for (const mod of mods) {
    const existing = merged.get(mod.name);
    if (!existing) {
      merged.set(mod.name, mod);
      continue;
    }
    existing.files = [...(existing.files ?? []), ...(mod.files ?? [])];
    if (mod.required === undefined) {
      delete existing.required;
    }
  }
  return [...merged.values()];
}
