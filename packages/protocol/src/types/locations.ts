// Location types - where the orchestrator looks for things

/**
 * A directory searched for mod archives
 */
export type ModLocationConfig = {
  path: string;

  /**
   * Search subdirectories too
   */
  recursive: boolean;

  /**
   * Regular expressions; files whose path matches any of them are skipped
   */
  ignorePatterns: string[];
};

/**
 * The locations config section
 */
export type LocationConfig = {
  /**
   * Directory holding config documents
   */
  configs: string;

  /**
   * Directory searched (top level only) for game pack archives
   */
  gamePacks: string;

  /**
   * Directory for shared libraries
   */
  libs: string;

  mods: ModLocationConfig[];
};
