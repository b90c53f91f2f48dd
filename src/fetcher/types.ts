/**
 * types.ts - Contract between the schema generator and release sources
 *
 * The generator never touches the network itself. It asks a ReleaseFetcher
 * which release is current and for a local directory holding that release.
 */

export interface ReleaseFetcher {
  /**
   * Name of the newest upstream release (e.g., "v2.6.1").
   * @throws Error when upstream cannot be reached
   */
  latestVersion(): Promise<string>;

  /**
   * Makes a release available on disk.
   *
   * @param tag - "latest" or a release tag
   * @returns Root directory of the extracted release
   */
  download(tag: string): Promise<string>;
}
