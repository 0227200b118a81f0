// Participant types - game packs and mods
//
// A participant is one loadable archive. Game packs integrate the host
// application; mods are ordinary extensions. Both share one shape and are told
// apart only by the isGamePack flag.

import type { SemVer } from './common.js';

/**
 * File name pattern participant archives are discovered by.
 */
export const PARTICIPANT_ARCHIVE_EXTENSION = '.pak';

/**
 * Path of the manifest inside every participant archive.
 */
export const PARTICIPANT_MANIFEST_PATH = 'manifest.json';

/**
 * Participant manifest - read from manifest.json at the archive root
 */
export type ParticipantManifest = {
  /**
   * Unique identifier (lowercase, alphanumeric with dashes or dots)
   */
  id: string;

  /**
   * Semantic version
   */
  version: SemVer;

  /**
   * Human-readable title, used in log messages
   */
  title: string;

  description?: string;

  authors?: string[];

  /**
   * Archive paths of the modules providing early patches, in run order
   */
  earlyPatches: string[];

  /**
   * Archive paths of the modules providing patches, in run order
   */
  patches: string[];
};
