import { afterEach, beforeAll, beforeEach, describe, expect, test } from "vitest";
import { existsSync, mkdirSync, readFileSync, readdirSync, rmSync } from "node:fs";
import { join } from "node:path";
import {
  DownloadError,
  ExtractError,
  MissingAssetError,
  NotFoundError,
} from "../../core/errors";
import {
  buildReleaseArchive,
  fakeFetch,
  makeTempDir,
} from "../../core/__tests__/helpers";
import {
  cacheEntryPath,
  ensureCacheEntry,
  layoutRoot,
  listCachedTags,
} from "../cache";

const ARCHIVE_URL = "https://downloads.test/NyarchLinux.tar.gz";

let archive: Buffer;
let cacheRoot: string;

beforeAll(async () => {
  archive = await buildReleaseArchive();
});

beforeEach(() => {
  cacheRoot = join(makeTempDir("cache"), "cache");
});

afterEach(() => {
  rmSync(join(cacheRoot, ".."), { recursive: true, force: true });
});

function leftovers(): string[] {
  return readdirSync(cacheRoot).filter((name) => name.startsWith("."));
}

describe("cacheEntryPath", () => {
  test("sanitizes the tag into one segment", () => {
    expect(cacheEntryPath("/c", "release/1 beta")).toBe("/c/release_1_beta");
  });

  test("rejects a tag made only of dots", () => {
    expect(() => cacheEntryPath("/c", "..")).toThrow(NotFoundError);
  });
});

describe("ensureCacheEntry", () => {
  test("downloads once and serves later calls from the cache", async () => {
    const { fetch, calls } = fakeFetch({ [ARCHIVE_URL]: () => new Response(archive) });
    const release = { tag: "v3.2.0", archiveUrl: ARCHIVE_URL };

    const first = await ensureCacheEntry(release, cacheRoot, { fetch });
    const second = await ensureCacheEntry(release, cacheRoot, { fetch });

    expect(first).toEqual({
      tag: "v3.2.0",
      extractedPath: join(cacheRoot, "v3.2.0"),
      fromCache: false,
    });
    expect(second.fromCache).toBe(true);
    expect(calls).toEqual([ARCHIVE_URL]);
    expect(
      readFileSync(
        join(
          cacheRoot,
          "v3.2.0/NyarchLinuxComp/Gnome/etc/skel/.config/kitty/kitty.conf",
        ),
        "utf-8",
      ),
    ).toBe("font_size 12.0\n");
    expect(leftovers()).toEqual([]);
  });

  test("a new tag gets its own entry next to the old one", async () => {
    const { fetch, calls } = fakeFetch({ [ARCHIVE_URL]: () => new Response(archive) });

    await ensureCacheEntry({ tag: "v3.1.0", archiveUrl: ARCHIVE_URL }, cacheRoot, { fetch });
    await ensureCacheEntry({ tag: "v3.2.0", archiveUrl: ARCHIVE_URL }, cacheRoot, { fetch });

    expect(calls).toHaveLength(2);
    expect(listCachedTags(cacheRoot)).toEqual(["v3.2.0", "v3.1.0"]);
  });

  test("replaces an empty leftover directory", async () => {
    const { fetch, calls } = fakeFetch({ [ARCHIVE_URL]: () => new Response(archive) });
    mkdirSync(join(cacheRoot, "v3.2.0"), { recursive: true });

    const entry = await ensureCacheEntry(
      { tag: "v3.2.0", archiveUrl: ARCHIVE_URL },
      cacheRoot,
      { fetch },
    );

    expect(entry.fromCache).toBe(false);
    expect(calls).toHaveLength(1);
  });

  test("a truncated archive leaves no canonical directory behind", async () => {
    const truncated = archive.subarray(0, Math.floor(archive.length / 2));
    const { fetch } = fakeFetch({ [ARCHIVE_URL]: () => new Response(truncated) });

    await expect(
      ensureCacheEntry({ tag: "v3.2.0", archiveUrl: ARCHIVE_URL }, cacheRoot, { fetch }),
    ).rejects.toThrow(ExtractError);

    expect(existsSync(join(cacheRoot, "v3.2.0"))).toBe(false);
    expect(leftovers()).toEqual([]);
  });

  test("an empty download is a download error", async () => {
    const { fetch } = fakeFetch({ [ARCHIVE_URL]: () => new Response("") });

    await expect(
      ensureCacheEntry({ tag: "v3.2.0", archiveUrl: ARCHIVE_URL }, cacheRoot, { fetch }),
    ).rejects.toThrow(DownloadError);
    expect(existsSync(join(cacheRoot, "v3.2.0"))).toBe(false);
  });

  test("an HTTP error is a download error", async () => {
    const { fetch } = fakeFetch({});

    await expect(
      ensureCacheEntry({ tag: "v3.2.0", archiveUrl: ARCHIVE_URL }, cacheRoot, { fetch }),
    ).rejects.toThrow(`Download of ${ARCHIVE_URL} failed with HTTP 404`);
  });
});

describe("layoutRoot", () => {
  test("picks the first candidate present in the entry", async () => {
    const { fetch } = fakeFetch({ [ARCHIVE_URL]: () => new Response(archive) });
    const entry = await ensureCacheEntry(
      { tag: "v3.2.0", archiveUrl: ARCHIVE_URL },
      cacheRoot,
      { fetch },
    );

    expect(layoutRoot(entry, ["NyarchLinux/Gnome", "NyarchLinuxComp/Gnome"])).toBe(
      join(cacheRoot, "v3.2.0", "NyarchLinuxComp/Gnome"),
    );
  });

  test("throws MissingAssetError when no candidate exists", () => {
    const entry = { tag: "v1", extractedPath: join(cacheRoot, "v1"), fromCache: true };

    expect(() => layoutRoot(entry, ["NyarchLinux/Gnome"])).toThrow(MissingAssetError);
  });
});

describe("listCachedTags", () => {
  test("is empty for a missing cache", () => {
    expect(listCachedTags(join(cacheRoot, "nope"))).toEqual([]);
  });
});
