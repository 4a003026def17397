import { NetworkError, NotFoundError } from "../core/errors";
import { LatestReleaseSchema } from "../core/schemas";
import type { Release } from "../core/types";
import { getPackageVersion } from "../install/utils";

export type FetchLike = typeof fetch;

export interface ResolveOptions {
  apiBaseUrl: string;
  archiveName: string;
  fetch?: FetchLike;
}

function releaseDownloadUrl(
  owner: string,
  repo: string,
  tag: string,
  archiveName: string,
): string {
  return `https://github.com/${owner}/${repo}/releases/download/${encodeURIComponent(tag)}/${archiveName}`;
}

/**
 * Looks up the release the API marks as latest. The API's designation is
 * trusted as-is; no version ordering happens here.
 */
export async function resolveRelease(
  owner: string,
  repo: string,
  options: ResolveOptions,
): Promise<Release> {
  const fetchImpl = options.fetch ?? fetch;
  const base = options.apiBaseUrl.replace(/\/+$/, "");
  const url = `${base}/repos/${owner}/${repo}/releases/latest`;

  let res: Response;
  try {
    res = await fetchImpl(url, {
      headers: {
        Accept: "application/vnd.github+json",
        "User-Agent": `nyarch-kde-setup/${getPackageVersion()}`,
      },
    });
  } catch (err) {
    throw new NetworkError(`Failed to reach ${url}`, { cause: err });
  }

  if (res.status === 404) {
    throw new NotFoundError(`No published release for ${owner}/${repo}`);
  }
  if (!res.ok) {
    throw new NetworkError(
      `Release lookup for ${owner}/${repo} failed with HTTP ${res.status}`,
    );
  }

  let body: unknown;
  try {
    body = await res.json();
  } catch (err) {
    throw new NetworkError(`Malformed release response from ${url}`, {
      cause: err,
    });
  }

  const parsed = LatestReleaseSchema.safeParse(body);
  if (!parsed.success || !parsed.data.tag_name.trim()) {
    throw new NotFoundError(`tag_name not found in release response for ${owner}/${repo}`);
  }

  const tag = parsed.data.tag_name.trim();
  const asset = parsed.data.assets.find((a) => a.name === options.archiveName);

  return {
    tag,
    archiveUrl:
      asset?.browser_download_url ??
      releaseDownloadUrl(owner, repo, tag, options.archiveName),
  };
}
