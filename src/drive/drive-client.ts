/**
 * Google Drive Client
 *
 * Imports documents that users share as Google Docs/Sheets/Slides/Drive
 * links. With a service account file the Drive v3 API is used (including
 * folders); without one, files shared as "anyone with the link" are fetched
 * from their public export URLs.
 */

import fs from "fs";
import path from "path";
import { pipeline } from "stream/promises";
import { google, type drive_v3 } from "googleapis";
import { CONFIG } from "../config.js";
import { log } from "../utils/logger.js";
import { BackendError, ConfigError, ValidationError, errorMessage } from "../errors.js";
import { mkdirSecure } from "../utils/file-permissions.js";

export type DriveLinkType = "document" | "spreadsheet" | "presentation" | "file" | "folder";
export type PublicLinkType = Exclude<DriveLinkType, "folder">;

export interface DriveLink {
  url: string;
  id: string;
  type: DriveLinkType;
}

export interface DriveFileInfo {
  id: string;
  name: string;
  mimeType: string;
  size?: string;
  modifiedTime?: string;
}

export interface DownloadedFile {
  filePath: string;
  name: string;
}

export const MAX_URLS_PER_REQUEST = 10;
export const MAX_FILES_PER_FOLDER = 50;

const FOLDER_MIME = "application/vnd.google-apps.folder";

const URL_PATTERNS: Array<[RegExp, DriveLinkType]> = [
  [/docs\.google\.com\/document\/d\/([a-zA-Z0-9_-]+)/, "document"],
  [/docs\.google\.com\/spreadsheets\/d\/([a-zA-Z0-9_-]+)/, "spreadsheet"],
  [/docs\.google\.com\/presentation\/d\/([a-zA-Z0-9_-]+)/, "presentation"],
  [/drive\.google\.com\/file\/d\/([a-zA-Z0-9_-]+)/, "file"],
  [/drive\.google\.com\/open\?id=([a-zA-Z0-9_-]+)/, "file"],
  [/drive\.google\.com\/drive\/folders\/([a-zA-Z0-9_-]+)/, "folder"],
  [/drive\.google\.com\/drive\/u\/\d+\/folders\/([a-zA-Z0-9_-]+)/, "folder"],
];

/** Google-native formats and what they are exported as */
export const GOOGLE_EXPORT_FORMATS: Record<string, { mimeType: string; extension: string }> = {
  "application/vnd.google-apps.document": { mimeType: "application/pdf", extension: ".pdf" },
  "application/vnd.google-apps.spreadsheet": {
    mimeType: "application/vnd.openxmlformats-officedocument.spreadsheetml.sheet",
    extension: ".xlsx",
  },
  "application/vnd.google-apps.presentation": { mimeType: "application/pdf", extension: ".pdf" },
  "application/vnd.google-apps.drawing": { mimeType: "application/pdf", extension: ".pdf" },
};

const PUBLIC_EXPORT: Record<PublicLinkType, { url: (id: string) => string; extension: string }> = {
  document: { url: (id) => `https://docs.google.com/document/d/${id}/export?format=pdf`, extension: ".pdf" },
  spreadsheet: { url: (id) => `https://docs.google.com/spreadsheets/d/${id}/export?format=xlsx`, extension: ".xlsx" },
  presentation: { url: (id) => `https://docs.google.com/presentation/d/${id}/export/pdf`, extension: ".pdf" },
  file: { url: (id) => `https://drive.google.com/uc?export=download&id=${id}`, extension: "" },
};

export function publicExportUrl(id: string, type: PublicLinkType): string {
  return PUBLIC_EXPORT[type].url(id);
}

export function extractFileId(url: string): { id: string; type: DriveLinkType } | undefined {
  for (const [pattern, type] of URL_PATTERNS) {
    const match = pattern.exec(url);
    if (match) {
      return { id: match[1], type };
    }
  }
  return undefined;
}

/**
 * All Google links in a message, first occurrence per file id, at most
 * MAX_URLS_PER_REQUEST.
 */
export function extractAllUrls(text: string): DriveLink[] {
  const results: DriveLink[] = [];
  const seen = new Set<string>();

  for (const raw of text.match(/https?:\/\/[^\s<>"']+(?<=[a-zA-Z0-9_/=-])/g) ?? []) {
    const url = raw.replace(/[,;:!?)]+$/, "");
    const extracted = extractFileId(url);
    if (extracted && !seen.has(extracted.id)) {
      seen.add(extracted.id);
      results.push({ url, ...extracted });
    }
  }

  return results.slice(0, MAX_URLS_PER_REQUEST);
}

export function sanitizeFilename(name: string): string {
  return name.replace(/[<>:"/\\|?*]/g, "_").slice(0, 200);
}

/** File name from a Content-Disposition header, percent-decoded */
export function filenameFromDisposition(header: string | null): string | undefined {
  if (!header) return undefined;
  const match = /filename\*?=['"]?(?:UTF-8'')?([^'";\n]+)/i.exec(header);
  if (!match) return undefined;
  try {
    return decodeURIComponent(match[1]);
  } catch {
    return match[1];
  }
}

/**
 * The Drive v3 calls the importer needs. GoogleDriveApi implements it with
 * googleapis; tests pass a fake.
 */
export interface DriveApi {
  getFile(fileId: string): Promise<DriveFileInfo>;
  listChildren(folderId: string, pageToken?: string): Promise<{ files: DriveFileInfo[]; nextPageToken?: string }>;
  /** Writes the file (or its export in `exportMimeType`) to destPath */
  download(fileId: string, destPath: string, exportMimeType?: string): Promise<void>;
}

function toFileInfo(file: drive_v3.Schema$File): DriveFileInfo {
  if (!file.id) {
    throw new BackendError("drive", "Drive returned a file without an id");
  }
  return {
    id: file.id,
    name: file.name ?? file.id,
    mimeType: file.mimeType ?? "",
    size: file.size ?? undefined,
    modifiedTime: file.modifiedTime ?? undefined,
  };
}

export class GoogleDriveApi implements DriveApi {
  private drive: drive_v3.Drive;

  constructor(keyFile: string) {
    const auth = new google.auth.GoogleAuth({
      keyFile,
      scopes: ["https://www.googleapis.com/auth/drive.readonly"],
    });
    this.drive = google.drive({ version: "v3", auth });
  }

  async getFile(fileId: string): Promise<DriveFileInfo> {
    const res = await this.drive.files.get({ fileId, fields: "id,name,mimeType,size,modifiedTime" });
    return toFileInfo(res.data);
  }

  async listChildren(folderId: string, pageToken?: string): Promise<{ files: DriveFileInfo[]; nextPageToken?: string }> {
    const res = await this.drive.files.list({
      q: `'${folderId}' in parents and trashed = false`,
      fields: "nextPageToken, files(id, name, mimeType, size)",
      pageSize: 100,
      pageToken,
    });
    return {
      files: (res.data.files ?? []).map(toFileInfo),
      nextPageToken: res.data.nextPageToken ?? undefined,
    };
  }

  async download(fileId: string, destPath: string, exportMimeType?: string): Promise<void> {
    const res = exportMimeType
      ? await this.drive.files.export({ fileId, mimeType: exportMimeType }, { responseType: "stream" })
      : await this.drive.files.get({ fileId, alt: "media" }, { responseType: "stream" });
    await pipeline(res.data, fs.createWriteStream(destPath));
  }
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;

export interface DriveClientOptions {
  /** Injected Drive API; by default built from the service account file when it exists */
  api?: DriveApi | null;
  serviceAccountFile?: string;
  fetch?: FetchFn;
  /** Public download timeout, default 60 s */
  timeoutMs?: number;
}

export class DriveClient {
  private api: DriveApi | null;
  private fetchFn: FetchFn;
  private timeoutMs: number;

  constructor(options: DriveClientOptions = {}) {
    const keyFile = options.serviceAccountFile ?? CONFIG.googleServiceAccountFile;
    if (options.api !== undefined) {
      this.api = options.api;
    } else if (fs.existsSync(keyFile)) {
      this.api = new GoogleDriveApi(keyFile);
      log.info("Google Drive API initialized");
    } else {
      this.api = null;
      log.dim(`Service account file not found: ${keyFile}, only public links will work`);
    }
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.timeoutMs = options.timeoutMs ?? 60_000;
  }

  isConfigured(): boolean {
    return this.api !== null;
  }

  private requireApi(): DriveApi {
    if (!this.api) {
      throw new ConfigError("Google Drive not configured. Set GOOGLE_SERVICE_ACCOUNT_FILE to a service account key.");
    }
    return this.api;
  }

  /**
   * Download a file shared as "anyone with the link" from its public export
   * URL. An HTML response for a Docs/Sheets/Slides link means access was
   * denied and is rejected.
   */
  async downloadPublicFile(fileId: string, type: DriveLinkType, destDir: string): Promise<DownloadedFile> {
    if (type === "folder") {
      throw new ValidationError("Folders cannot be downloaded without a service account");
    }

    const url = publicExportUrl(fileId, type);
    let response: Response;
    try {
      response = await this.fetchFn(url, { redirect: "follow", signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      log.error(`❌ Public download error for ${fileId}: ${errorMessage(error)}`);
      throw new BackendError("drive", `Download failed for ${fileId}: ${errorMessage(error)}`);
    }

    if (response.status !== 200) {
      throw new BackendError("drive", `Download failed for ${fileId}: HTTP ${response.status}`);
    }
    const contentType = response.headers.get("content-type") ?? "";
    if (contentType.includes("text/html") && type !== "file") {
      throw new BackendError("drive", `Download failed for ${fileId}: got a web page instead of a file (is the link public?)`);
    }

    const name = sanitizeFilename(
      filenameFromDisposition(response.headers.get("content-disposition")) ?? `${fileId}${PUBLIC_EXPORT[type].extension}`
    );
    mkdirSecure(destDir);
    const filePath = path.join(destDir, name);
    fs.writeFileSync(filePath, Buffer.from(await response.arrayBuffer()));

    log.info(`📥 Downloaded (public): ${name} -> ${filePath}`);
    return { filePath, name };
  }

  async getFileInfo(fileId: string): Promise<DriveFileInfo> {
    try {
      return await this.requireApi().getFile(fileId);
    } catch (error) {
      log.error(`❌ Failed to get file info for ${fileId}: ${errorMessage(error)}`);
      throw error instanceof ConfigError ? error : new BackendError("drive", errorMessage(error));
    }
  }

  /**
   * Download a file through the API, exporting Google-native documents. With
   * no service account, falls back to the public URL when `type` is known.
   */
  async downloadFile(fileId: string, destDir: string, type?: DriveLinkType): Promise<DownloadedFile> {
    if (!this.api) {
      if (!type) {
        throw new ConfigError("Google Drive not configured and the link type is unknown");
      }
      log.info(`No service account, trying public download for ${fileId}`);
      return this.downloadPublicFile(fileId, type, destDir);
    }

    const info = await this.getFileInfo(fileId);
    const exportFormat = GOOGLE_EXPORT_FORMATS[info.mimeType];
    let name = info.name;
    if (exportFormat && !name.toLowerCase().endsWith(exportFormat.extension)) {
      name += exportFormat.extension;
    }
    name = sanitizeFilename(name);

    mkdirSecure(destDir);
    const filePath = path.join(destDir, name);
    try {
      await this.api.download(fileId, filePath, exportFormat?.mimeType);
    } catch (error) {
      log.error(`❌ Failed to download file ${fileId}: ${errorMessage(error)}`);
      throw new BackendError("drive", `Download failed for ${info.name}: ${errorMessage(error)}`);
    }

    log.info(`📥 Downloaded: ${name} -> ${filePath}`);
    return { filePath, name };
  }

  /**
   * Files in a folder and, when `recursive`, its subfolders (breadth first),
   * up to MAX_FILES_PER_FOLDER.
   */
  async listFolder(folderId: string, recursive: boolean = true): Promise<DriveFileInfo[]> {
    const api = this.requireApi();
    const files: DriveFileInfo[] = [];
    const queue = [folderId];

    while (queue.length > 0 && files.length < MAX_FILES_PER_FOLDER) {
      const current = queue.shift();
      if (current === undefined) break;

      try {
        let pageToken: string | undefined;
        do {
          const page = await api.listChildren(current, pageToken);
          for (const item of page.files) {
            if (item.mimeType === FOLDER_MIME) {
              if (recursive) queue.push(item.id);
            } else if (files.length < MAX_FILES_PER_FOLDER) {
              files.push(item);
            }
          }
          pageToken = page.nextPageToken;
        } while (pageToken && files.length < MAX_FILES_PER_FOLDER);
      } catch (error) {
        if (current === folderId) {
          throw new BackendError("drive", `Failed to list folder ${folderId}: ${errorMessage(error)}`);
        }
        log.warning(`⚠️ Skipping subfolder ${current}: ${errorMessage(error)}`);
      }
    }

    return files;
  }

  /**
   * Download every file of a folder. Files that fail are logged and left out.
   */
  async downloadFolder(folderId: string, destDir: string): Promise<DownloadedFile[]> {
    const downloaded: DownloadedFile[] = [];
    for (const file of await this.listFolder(folderId)) {
      try {
        downloaded.push(await this.downloadFile(file.id, destDir));
      } catch (error) {
        log.warning(`⚠️ Skipping ${file.name}: ${errorMessage(error)}`);
      }
    }
    return downloaded;
  }
}
