import { NotFoundError, ResponseShapeError } from '../errors.js';
import type { Logger } from '../utils/logger.js';
import type { AddonInfo, CurseModFile, CurseModFileInfo, Maturity } from '../types/index.js';
import type { CachedFetcher } from './fetcher.js';
import { filePageResponse, fileResponse, modResponse, searchResponse, type RawFile, type RawMod } from './schemas.js';
import { canonicalDownloadUrl, downloadUrlForFile, slugFromWebsiteUrl } from './urls.js';

const DEFAULT_BASE_URL = 'https://api.curseforge.com/v1';
const MINECRAFT_GAME_ID = 432;
const MODS_CLASS_ID = 6;
const PAGE_SIZE = 50;
const REQUIRED_DEPENDENCY = 3;

const RELEASE_TYPES: Record<RawFile['releaseType'], Maturity> = {
  1: 'release',
  2: 'beta',
  3: 'alpha',
};

const MATURITY_RANK: Record<Maturity, number> = {
  release: 0,
  beta: 1,
  alpha: 2,
};

export interface CurseForgeClientOptions {
  fetcher: CachedFetcher;
  baseUrl?: string;
  pageSize?: number;
  logger?: Logger;
}

export class CurseForgeClient {
  private readonly fetcher: CachedFetcher;
  private readonly baseUrl: string;
  private readonly pageSize: number;
  private readonly logger: Logger | undefined;

  constructor(options: CurseForgeClientOptions) {
    this.fetcher = options.fetcher;
    this.baseUrl = options.baseUrl ?? DEFAULT_BASE_URL;
    this.pageSize = options.pageSize ?? PAGE_SIZE;
    this.logger = options.logger;
  }

  async getAddonInfo(projectId: number): Promise<AddonInfo> {
    const response = await this.fetcher.getJson(
      {
        url: `${this.baseUrl}/mods/${projectId}`,
        operation: `fetching addon info for project id ${projectId}`,
      },
      modResponse,
    );
    return toAddonInfo(response.data);
  }

  async getFile(projectId: number, fileId: number): Promise<CurseModFile> {
    const response = await this.fetcher.getJson(
      {
        url: `${this.baseUrl}/mods/${projectId}/files/${fileId}`,
        operation: `fetching file ${fileId} for project id ${projectId}`,
      },
      fileResponse,
    );
    return toModFile(response.data);
  }

  /**
   * Collects every page of the project's file list. Each page is cached on
   * its own URL, so a rerun revalidates pages independently.
   */
  async listFiles(projectId: number, gameVersion?: string): Promise<CurseModFile[]> {
    const operation = `fetching files for project id ${projectId}`;
    const files: CurseModFile[] = [];

    for (let index = 0; ; index += this.pageSize) {
      const page = await this.fetcher.getJson(
        {
          url: `${this.baseUrl}/mods/${projectId}/files`,
          query: { gameVersion, index, pageSize: this.pageSize },
          operation,
        },
        filePageResponse,
      );

      if (!page.pagination) {
        throw new ResponseShapeError(`Missing pagination info while ${operation} (index ${index})`);
      }
      if (page.pagination.resultCount === 0) {
        break;
      }

      files.push(...page.data.map(toModFile));
      this.logger?.(`Project ${projectId}: ${files.length} files after index ${index}`);
    }

    return files;
  }

  async findBySlug(slug: string): Promise<AddonInfo> {
    const response = await this.fetcher.getJson(
      {
        url: `${this.baseUrl}/mods/search`,
        query: { gameId: MINECRAFT_GAME_ID, classId: MODS_CLASS_ID, slug },
        operation: `searching for slug ${slug}`,
      },
      searchResponse,
    );

    const match = response.data.find((raw) => slugFromWebsiteUrl(raw.links.websiteUrl) === slug);
    if (!match) {
      throw new NotFoundError(`No mod found with slug "${slug}"`);
    }
    return toAddonInfo(match);
  }

  /** Newest file for the game version whose release type is at least `maturity`. */
  async latestFile(projectId: number, gameVersion: string, maturity: Maturity = 'release'): Promise<CurseModFile> {
    const files = await this.listFiles(projectId, gameVersion);
    const candidates = files
      .filter((file) => MATURITY_RANK[file.releaseType] <= MATURITY_RANK[maturity])
      .sort((a, b) => Date.parse(b.fileDate) - Date.parse(a.fileDate));

    const [latest] = candidates;
    if (!latest) {
      throw new NotFoundError(
        `No ${maturity} file of project id ${projectId} matches game version ${gameVersion}`,
      );
    }
    return latest;
  }

  async getFileInfo(file: CurseModFile): Promise<CurseModFileInfo> {
    return this.fetcher.getFileInfo(
      downloadUrlOf(file),
      `hashing file ${file.id} for project id ${file.modId}`,
    );
  }

  /** Hashes a file hosted outside the catalog. */
  async getRemoteFileInfo(url: string): Promise<CurseModFileInfo> {
    return this.fetcher.getFileInfo(url, `hashing ${url}`);
  }
}

export function downloadUrlOf(file: CurseModFile): string {
  return file.downloadUrl ? canonicalDownloadUrl(file.downloadUrl) : downloadUrlForFile(file.id, file.fileName);
}

export function isRequiredDependency(relationType: number): boolean {
  return relationType === REQUIRED_DEPENDENCY;
}

function toAddonInfo(raw: RawMod): AddonInfo {
  const slug = slugFromWebsiteUrl(raw.links.websiteUrl);
  if (!slug) {
    throw new ResponseShapeError(`Extracting slug from ${raw.links.websiteUrl} for project id ${raw.id}`);
  }
  return {
    id: raw.id,
    name: raw.name,
    slug,
    websiteUrl: raw.links.websiteUrl,
  };
}

function toModFile(raw: RawFile): CurseModFile {
  return {
    id: raw.id,
    modId: raw.modId,
    displayName: raw.displayName,
    fileName: raw.fileName,
    fileDate: raw.fileDate,
    releaseType: RELEASE_TYPES[raw.releaseType],
    downloadUrl: raw.downloadUrl ? canonicalDownloadUrl(raw.downloadUrl) : null,
    gameVersions: raw.gameVersions,
    dependencies: raw.dependencies,
  };
}
