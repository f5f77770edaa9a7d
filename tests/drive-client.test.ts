import fs from "fs";
import os from "os";
import path from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  DriveClient,
  extractAllUrls,
  extractFileId,
  filenameFromDisposition,
  sanitizeFilename,
  type DriveApi,
  type DriveFileInfo,
} from "../src/drive/drive-client.js";
import { BackendError, ConfigError, ValidationError } from "../src/errors.js";

describe("link parsing", () => {
  it("extracts the id and type of a document", () => {
    expect(extractFileId("https://docs.google.com/document/d/abc123/edit")).toEqual({ id: "abc123", type: "document" });
    expect(extractFileId("https://drive.google.com/drive/u/0/folders/F_1")).toEqual({ id: "F_1", type: "folder" });
    expect(extractFileId("https://drive.google.com/open?id=xyz")).toEqual({ id: "xyz", type: "file" });
    expect(extractFileId("https://example.com/document/d/abc")).toBeUndefined();
  });

  it("finds every Google link in a message", () => {
    const text = "Check https://docs.google.com/document/d/abc/edit and https://drive.google.com/file/d/xyz/view";
    expect(extractAllUrls(text)).toEqual([
      { url: "https://docs.google.com/document/d/abc/edit", id: "abc", type: "document" },
      { url: "https://drive.google.com/file/d/xyz/view", id: "xyz", type: "file" },
    ]);
  });

  it("strips trailing punctuation, skips repeats and other sites", () => {
    const text =
      "(https://docs.google.com/spreadsheets/d/s1/edit), https://docs.google.com/spreadsheets/d/s1/view " +
      "https://example.com/page";
    expect(extractAllUrls(text)).toEqual([
      { url: "https://docs.google.com/spreadsheets/d/s1/edit", id: "s1", type: "spreadsheet" },
    ]);
  });

  it("keeps at most ten links", () => {
    const text = Array.from({ length: 12 }, (_, i) => `https://docs.google.com/document/d/doc${i}/edit`).join(" ");
    const links = extractAllUrls(text);
    expect(links).toHaveLength(10);
    expect(links[9].id).toBe("doc9");
  });
});

describe("file names", () => {
  it("replaces characters that are not allowed in file names", () => {
    expect(sanitizeFilename('a<b>:c"d/e\\f|g?h*i')).toBe("a_b__c_d_e_f_g_h_i");
    expect(sanitizeFilename("x".repeat(250))).toHaveLength(200);
  });

  it("reads Content-Disposition", () => {
    expect(filenameFromDisposition('attachment; filename="Tender terms.pdf"')).toBe("Tender terms.pdf");
    expect(filenameFromDisposition("attachment; filename*=UTF-8''%D0%A1%D1%80%D0%BE%D0%BA%D0%B8.pdf")).toBe(
      "Сроки.pdf"
    );
    expect(filenameFromDisposition("attachment; filename=%E0%A4%A")).toBe("%E0%A4%A");
    expect(filenameFromDisposition(null)).toBeUndefined();
    expect(filenameFromDisposition("inline")).toBeUndefined();
  });
});

describe("DriveClient", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "drive-test-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe("public links", () => {
    function clientReturning(response: Response) {
      const fetch = vi.fn(async (_input: string, _init?: RequestInit) => response);
      return { client: new DriveClient({ api: null, fetch }), fetch };
    }

    it("downloads a public document as PDF", async () => {
      const { client, fetch } = clientReturning(
        new Response("PDFDATA", { status: 200, headers: { "content-type": "application/pdf" } })
      );

      const file = await client.downloadPublicFile("abc", "document", dir);

      expect(fetch.mock.calls[0][0]).toBe("https://docs.google.com/document/d/abc/export?format=pdf");
      expect(file).toEqual({ filePath: path.join(dir, "abc.pdf"), name: "abc.pdf" });
      expect(fs.readFileSync(file.filePath, "utf-8")).toBe("PDFDATA");
    });

    it("names the file from Content-Disposition", async () => {
      const { client } = clientReturning(
        new Response("DOCX", {
          status: 200,
          headers: { "content-type": "application/octet-stream", "content-disposition": 'attachment; filename="report.docx"' },
        })
      );
      const file = await client.downloadFile("f1", dir, "file");
      expect(file.name).toBe("report.docx");
    });

    it("rejects a login page and HTTP errors", async () => {
      const html = clientReturning(new Response("<html>", { status: 200, headers: { "content-type": "text/html" } }));
      await expect(html.client.downloadPublicFile("abc", "document", dir)).rejects.toThrow(
        "Download failed for abc: got a web page instead of a file (is the link public?)"
      );

      const denied = clientReturning(new Response("no", { status: 403 }));
      await expect(denied.client.downloadPublicFile("abc", "file", dir)).rejects.toThrow(
        "Download failed for abc: HTTP 403"
      );
    });

    it("wraps network failures", async () => {
      const client = new DriveClient({
        api: null,
        fetch: async () => {
          throw new Error("ECONNRESET");
        },
      });
      await expect(client.downloadPublicFile("abc", "file", dir)).rejects.toThrow(BackendError);
    });

    it("cannot fetch folders or links of unknown type", async () => {
      const { client } = clientReturning(new Response("", { status: 200 }));
      expect(client.isConfigured()).toBe(false);
      await expect(client.downloadPublicFile("f", "folder", dir)).rejects.toThrow(ValidationError);
      await expect(client.downloadFile("f", dir)).rejects.toThrow(ConfigError);
      await expect(client.listFolder("f")).rejects.toThrow(ConfigError);
    });
  });

  describe("service account", () => {
    function file(id: string, mimeType = "application/pdf"): DriveFileInfo {
      return { id, name: `${id}.pdf`, mimeType };
    }
    const folderMime = "application/vnd.google-apps.folder";

    function fakeApi(children: Record<string, Array<{ files: DriveFileInfo[]; nextPageToken?: string }>>) {
      const downloads: Array<{ fileId: string; destPath: string; exportMimeType?: string }> = [];
      const api: DriveApi = {
        getFile: async (fileId) =>
          fileId === "gdoc"
            ? { id: fileId, name: "Terms", mimeType: "application/vnd.google-apps.document" }
            : file(fileId),
        listChildren: async (folderId, pageToken) => {
          const pages = children[folderId];
          if (!pages) throw new Error(`no access to ${folderId}`);
          return pages[pageToken ? Number(pageToken) : 0];
        },
        download: async (fileId, destPath, exportMimeType) => {
          if (fileId === "broken") throw new Error("403 Forbidden");
          downloads.push({ fileId, destPath, exportMimeType });
          fs.writeFileSync(destPath, fileId);
        },
      };
      return { api, downloads };
    }

    it("exports Google documents as PDF", async () => {
      const { api, downloads } = fakeApi({});
      const client = new DriveClient({ api });

      const result = await client.downloadFile("gdoc", dir);

      expect(result).toEqual({ filePath: path.join(dir, "Terms.pdf"), name: "Terms.pdf" });
      expect(downloads).toEqual([{ fileId: "gdoc", destPath: path.join(dir, "Terms.pdf"), exportMimeType: "application/pdf" }]);
    });

    it("lists folders breadth first across pages", async () => {
      const { api } = fakeApi({
        root: [
          { files: [file("a"), file("sub", folderMime)], nextPageToken: "1" },
          { files: [file("b"), file("locked", folderMime)] },
        ],
        sub: [{ files: [file("c")] }],
      });
      const client = new DriveClient({ api });

      expect((await client.listFolder("root")).map((f) => f.id)).toEqual(["a", "b", "c"]);
      expect((await client.listFolder("root", false)).map((f) => f.id)).toEqual(["a", "b"]);
      await expect(client.listFolder("missing")).rejects.toThrow("Failed to list folder missing: no access to missing");
    });

    it("caps a folder listing", async () => {
      const many = Array.from({ length: 60 }, (_, i) => file(`f${i}`));
      const { api } = fakeApi({ root: [{ files: many }] });
      expect(await new DriveClient({ api }).listFolder("root")).toHaveLength(50);
    });

    it("skips files that fail to download", async () => {
      const { api } = fakeApi({ root: [{ files: [file("a"), file("broken"), file("b")] }] });
      const downloaded = await new DriveClient({ api }).downloadFolder("root", dir);
      expect(downloaded.map((d) => d.name)).toEqual(["a.pdf", "b.pdf"]);
    });
  });
});
