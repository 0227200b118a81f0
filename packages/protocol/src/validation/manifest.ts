// Participant manifest validation
//
// Manifests are untrusted JSON read out of participant archives, so they are
// parsed against a zod schema before anything else looks at them.

import * as semver from 'semver';
import { z } from 'zod';
import type { ParticipantManifest } from '../types/participants.js';

const MANIFEST_ID_PATTERN = /^[a-z0-9][a-z0-9.-]*$/;

const archivePath = z
  .string()
  .min(1)
  .refine((value) => !value.startsWith('/') && !value.split('/').includes('..'), {
    message: 'Must be a relative path inside the archive',
  });

export const participantManifestSchema = z.object({
  id: z.string().regex(MANIFEST_ID_PATTERN, {
    message: 'Must be lowercase alphanumeric with dashes or dots',
  }),
  version: z.string().refine((value) => semver.valid(value) !== null, {
    message: 'Must be a semantic version',
  }),
  title: z.string().min(1),
  description: z.string().optional(),
  authors: z.array(z.string()).optional(),
  earlyPatches: z.array(archivePath).default([]),
  patches: z.array(archivePath).default([]),
});

/**
 * A single manifest problem
 */
export type ManifestValidationError = {
  path: string;
  message: string;
};

/**
 * Result of validating a manifest
 */
export type ManifestValidationResult =
  | { valid: true; manifest: ParticipantManifest; errors: [] }
  | { valid: false; errors: ManifestValidationError[] };

/**
 * Validate a parsed manifest.json value.
 */
export function validateManifest(value: unknown): ManifestValidationResult {
  const parsed = participantManifestSchema.safeParse(value);

  if (parsed.success) {
    return { valid: true, manifest: parsed.data, errors: [] };
  }

  return {
    valid: false,
    errors: parsed.error.issues.map((issue) => ({
      path: ['manifest', ...issue.path].join('.'),
      message: issue.message,
    })),
  };
}

/**
 * Parse manifest.json text. Malformed JSON is reported like any other error.
 */
export function parseManifest(text: string): ManifestValidationResult {
  let value: unknown;
  try {
    value = JSON.parse(text);
  } catch (error) {
    return {
      valid: false,
      errors: [
        {
          path: 'manifest',
          message: `Invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
        },
      ],
    };
  }

  return validateManifest(value);
}
