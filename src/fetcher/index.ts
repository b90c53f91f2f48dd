/**
 * fetcher/index.ts - Public API for release fetching
 *
 * Other modules import from here rather than from github-release.ts or types.ts.
 */

export type { ReleaseFetcher } from "./types";
export {
  GitHubReleaseFetcher,
  releaseName,
  type GitHubReleaseFetcherOptions,
  type ReleaseInfo,
} from "./github-release";
