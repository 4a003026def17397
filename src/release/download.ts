import { createWriteStream, statSync, writeFileSync } from "node:fs";
import { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { DownloadError } from "../core/errors";
import { ensureParent } from "../core/utils";
import type { FetchLike } from "./resolver";

/**
 * Streams `url` to `dest` and returns the number of bytes written. A
 * partial file may be left at `dest` on failure; callers own its cleanup.
 */
export async function downloadToFile(
  url: string,
  dest: string,
  fetchImpl: FetchLike = fetch,
): Promise<number> {
  let res: Response;
  try {
    res = await fetchImpl(url, { redirect: "follow" });
  } catch (err) {
    throw new DownloadError(`Failed to download ${url}`, { cause: err });
  }
  if (!res.ok) {
    throw new DownloadError(`Download of ${url} failed with HTTP ${res.status}`);
  }

  ensureParent(dest);
  if (res.body) {
    try {
      await pipeline(Readable.fromWeb(res.body), createWriteStream(dest));
    } catch (err) {
      throw new DownloadError(`Download of ${url} was interrupted`, {
        cause: err,
      });
    }
  } else {
    writeFileSync(dest, "");
  }

  const size = statSync(dest).size;
  if (size === 0) {
    throw new DownloadError(`Download of ${url} produced an empty file`);
  }
  return size;
}
