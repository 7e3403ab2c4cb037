/**
 * Read access to a compressed archive of files.
 *
 * Implemented once per container format and selected by
 * {@link detectArchiveFormat}; callers never branch on the format after that.
 */
export interface ArchiveContainer {
  /** The path of the archive file. */
  readonly path: string;

  /** Entry names as stored in the archive, directories included. */
  list(): Promise<string[]>;

  /** Write every entry below `destination`, creating it if needed. */
  extractAll(destination: string): Promise<void>;

  /** Release the archive. Further calls on the container fail. */
  close(): Promise<void>;
}
