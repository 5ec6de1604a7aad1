export type Maturity = 'release' | 'beta' | 'alpha';

export type Side = 'client' | 'server' | 'both';

export interface AddonInfo {
  id: number;
  name: string;
  slug: string;
  websiteUrl: string;
}

export interface FileDependency {
  modId: number;
  relationType: number;
}

export interface CurseModFile {
  id: number;
  modId: number;
  displayName: string;
  fileName: string;
  fileDate: string;
  releaseType: Maturity;
  downloadUrl: string | null;
  gameVersions: string[];
  dependencies: FileDependency[];
}

/** Hashes of a published binary, cached under its canonical download URL. */
export interface CurseModFileInfo {
  md5: string;
  sha256: string;
  size: number;
  downloadUrl: string;
}

export interface CurseManifestFile {
  projectID: number;
  fileID: number;
  required: boolean;
}

export interface CurseManifest {
  minecraft: {
    version: string;
    modLoaders?: Array<{ id: string; primary?: boolean }>;
  };
  name?: string;
  version?: string;
  author?: string;
  files: CurseManifestFile[];
}

export interface YamlModFile {
  name?: string;
  id?: number;
  maturity?: Maturity;
  filePageUrl?: string;
  src?: string;
  md5?: string;
}

export interface YamlMod {
  name: string;
  side?: Side;
  required?: boolean;
  default?: boolean;
  files?: YamlModFile[];
}

export interface YamlManifest {
  version: string;
  imports: string[];
  mods: YamlMod[];
}

export interface ResolvedMod {
  title: string;
  name: string;
  id?: number;
  side: Side;
  required: boolean;
  default: boolean;
  deps: string[];
  filename: string;
  encoded: string;
  page: string;
  src: string;
  type: 'remote';
  md5: string;
  sha256: string;
  size: number;
}

export interface NixManifest {
  version: string;
  imports: string[];
  mods: ResolvedMod[];
}
