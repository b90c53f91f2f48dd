/**
 * github-release.ts - Downloads AzAPI provider releases from GitHub
 *
 * The Bicep type files the pipeline parses ship inside the
 * terraform-provider-azapi source tree. This fetcher:
 * 1. Reads release metadata from the GitHub REST API
 * 2. Downloads the release tarball (skipped if already on disk)
 * 3. Extracts it with tar (skipped if already extracted)
 *
 * Everything it writes lives under one download directory, so a second run
 * for the same release touches the network only for metadata.
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { z } from "zod";
import { executeTar as defaultTar, type TarExecutor } from "../utils/tar";
import type { ReleaseFetcher } from "./types";

const GITHUB_API_URL = "https://api.github.com";

/**
 * The subset of GitHub's release payload the fetcher needs.
 */
const ReleaseInfoSchema = z.object({
  name: z.string().nullable(),
  tag_name: z.string(),
  tarball_url: z.string().url(),
});

export type ReleaseInfo = z.infer<typeof ReleaseInfoSchema>;

/**
 * Options for GitHubReleaseFetcher.
 */
export interface GitHubReleaseFetcherOptions {
  /** Repository owner. Defaults to "Azure". */
  owner?: string;
  /** Repository name. Defaults to "terraform-provider-azapi". */
  repo?: string;
  /**
   * Where tarballs are downloaded and extracted.
   * Defaults to AZAPI_DOWNLOAD_DIR env var or <tmpdir>/azapi_downloads.
   */
  downloadDir?: string;
  /** GitHub token for higher rate limits. Defaults to GITHUB_TOKEN env var. */
  token?: string;
  /** Injectable fetch for testing. Defaults to the global fetch. */
  fetch?: typeof fetch;
  /** Injectable tar executor for testing. Defaults to executeTar. */
  tar?: TarExecutor;
  /** Progress callback. Defaults to stdout. */
  onProgress?: (message: string) => void;
}

/**
 * Name used for files on disk: the release name, or the tag when the
 * release has no name.
 */
export function releaseName(release: ReleaseInfo): string {
  return release.name || release.tag_name;
}

/**
 * ReleaseFetcher backed by GitHub releases.
 *
 * Usage:
 *   const fetcher = new GitHubReleaseFetcher();
 *   const version = await fetcher.latestVersion(); // "v2.6.1"
 *   const dir = await fetcher.download(version);
 */
export class GitHubReleaseFetcher implements ReleaseFetcher {
  private readonly owner: string;
  private readonly repo: string;
  private readonly downloadDir: string;
  private readonly token: string | undefined;
  private readonly fetchImpl: typeof fetch;
  private readonly tar: TarExecutor;
  private readonly onProgress: (message: string) => void;

  constructor(options: GitHubReleaseFetcherOptions = {}) {
    this.owner = options.owner ?? "Azure";
    this.repo = options.repo ?? "terraform-provider-azapi";
    this.downloadDir =
      options.downloadDir ??
      process.env.AZAPI_DOWNLOAD_DIR ??
      path.join(os.tmpdir(), "azapi_downloads");
    this.token = options.token ?? process.env.GITHUB_TOKEN;
    this.fetchImpl = options.fetch ?? fetch;
    this.tar = options.tar ?? defaultTar;
    this.onProgress = options.onProgress ?? console.log; // eslint-disable-line no-console
  }

  /**
   * Name of the latest release (e.g., "v2.6.1").
   */
  async latestVersion(): Promise<string> {
    return releaseName(await this.releaseInfo("latest"));
  }

  /**
   * Downloads and extracts a release.
   *
   * @param tag - "latest" or a release tag (e.g., "v2.6.1")
   * @returns Directory holding the extracted source tree
   * @throws Error if a request fails or tar exits non-zero
   */
  async download(tag: string): Promise<string> {
    const release = await this.releaseInfo(tag);
    const name = releaseName(release);

    fs.mkdirSync(this.downloadDir, { recursive: true });

    const archive = path.join(this.downloadDir, `${name}.tar.gz`);
    if (!fs.existsSync(archive)) {
      this.onProgress(`Downloading ${name}.tar.gz from ${release.tarball_url}`);
      const response = await this.request(release.tarball_url);
      fs.writeFileSync(archive, Buffer.from(await response.arrayBuffer()));
    }

    const extractDir = path.join(this.downloadDir, `extracted_${name}`);
    if (!fs.existsSync(extractDir)) {
      this.onProgress(`Extracting ${archive}`);
      fs.mkdirSync(extractDir, { recursive: true });

      // GitHub tarballs wrap everything in one "<owner>-<repo>-<sha>/" folder.
      const result = this.tar([
        "-xzf",
        archive,
        "-C",
        extractDir,
        "--strip-components=1",
      ]);
      if (result.isError) {
        fs.rmSync(extractDir, { recursive: true, force: true });
        throw new Error(`Failed to extract ${archive}: ${result.output}`);
      }
    }

    return extractDir;
  }

  /**
   * Fetches and validates release metadata.
   */
  private async releaseInfo(tag: string): Promise<ReleaseInfo> {
    const releasePath = tag === "latest" ? "latest" : `tags/${tag}`;
    const url = `${GITHUB_API_URL}/repos/${this.owner}/${this.repo}/releases/${releasePath}`;

    const response = await this.request(url);
    const parsed = ReleaseInfoSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new Error(`Unexpected release payload from ${url}: ${parsed.error.message}`);
    }
    return parsed.data;
  }

  private async request(url: string): Promise<Response> {
    const headers: Record<string, string> = {
      Accept: "application/vnd.github+json",
    };
    if (this.token) {
      headers.Authorization = `Bearer ${this.token}`;
    }

    const response = await this.fetchImpl(url, { headers, redirect: "follow" });
    if (!response.ok) {
      throw new Error(`GitHub request failed (${response.status}): ${url}`);
    }
    return response;
  }
}
