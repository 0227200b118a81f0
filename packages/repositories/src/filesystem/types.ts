// Host filesystem access used for discovering participant archives and
// creating the configured locations.

/**
 * Options for listing files
 */
export type ListFilesOptions = {
  /** Descend into subdirectories */
  recursive?: boolean;
};

export interface LocationFileSystem {
  /**
   * Check if a path exists.
   */
  exists(path: string): Promise<boolean>;

  /**
   * Check if a path is a regular file.
   */
  isFile(path: string): Promise<boolean>;

  /**
   * Read a file as UTF-8 text.
   */
  readText(path: string): Promise<string>;

  /**
   * Create a directory (and parents if needed).
   */
  mkdir(path: string): Promise<void>;

  /**
   * List the files in a directory as full paths, sorted.
   * @throws when the directory cannot be read
   */
  listFiles(directory: string, options?: ListFilesOptions): Promise<string[]>;
}
