import { z } from "zod";

const ReleaseAssetSchema = z.object({
  name: z.string().describe("File name of the uploaded asset"),
  browser_download_url: z
    .string()
    .url()
    .describe("Public download URL for the asset"),
});

/** Subset of the GitHub "get the latest release" response this tool reads. */
export const LatestReleaseSchema = z.object({
  tag_name: z.string().describe("Git tag the release was published from"),
  assets: z
    .array(ReleaseAssetSchema)
    .default([])
    .describe("Files attached to the release"),
});

export const InstallerConfigSchema = z
  .object({
    owner: z.string().min(1).describe("Owner of the asset repository"),
    repo: z.string().min(1).describe("Name of the asset repository"),
    archiveName: z
      .string()
      .min(1)
      .describe("Release asset holding the themed file tree"),
    apiBaseUrl: z.string().url().describe("Base URL of the releases API"),
    cacheRoot: z
      .string()
      .min(1)
      .describe("Directory extracted releases are cached under"),
    layoutCandidates: z
      .array(z.string().min(1))
      .min(1)
      .describe(
        "Directories inside an extracted release that asset paths are relative to, tried in order",
      ),
  })
  .strict();

export const PartialInstallerConfigSchema = InstallerConfigSchema.partial();

export type InstallerConfig = z.infer<typeof InstallerConfigSchema>;
export type PartialInstallerConfig = z.infer<
  typeof PartialInstallerConfigSchema
>;
