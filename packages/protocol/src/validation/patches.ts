// Patch module export validation
//
// A patch module is evaluated participant code; its default export (or the
// exports object itself) must describe exactly one early patch or patch.

import { z } from 'zod';
import type { ModuleExports } from '../types/modules.js';
import type {
  EarlyPatchContext,
  EarlyPatchDefinition,
  PatchContext,
  PatchDefinition,
} from '../types/patches.js';

function callable<TContext>() {
  return z.custom<(ctx: TContext) => void | Promise<void>>(
    (value) => typeof value === 'function',
    { message: 'Expected a function' }
  );
}

const earlyPatchSchema = z.object({
  name: z.string().min(1),
  targets: z.array(z.string().min(1)),
  prepatch: callable<EarlyPatchContext>(),
});

const patchSchema = z.object({
  name: z.string().min(1),
  onLoaded: callable<PatchContext>(),
});

/**
 * Result of reading a patch definition out of module exports
 */
export type PatchExportResult<T> =
  | { valid: true; definition: T }
  | { valid: false; errors: string[] };

function exportedValue(exports: ModuleExports): unknown {
  return 'default' in exports ? exports.default : exports;
}

function issues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Read an early patch definition from a module's exports.
 */
export function readEarlyPatchExport(exports: ModuleExports): PatchExportResult<EarlyPatchDefinition> {
  const value = exportedValue(exports);
  const parsed = earlyPatchSchema.safeParse(value);

  if (!parsed.success) {
    return { valid: false, errors: issues(parsed.error) };
  }

  const { name, targets, prepatch } = parsed.data;
  return {
    valid: true,
    definition: {
      name,
      targets,
      prepatch: (ctx) => prepatch.call(value, ctx),
    },
  };
}

/**
 * Read a patch definition from a module's exports.
 */
export function readPatchExport(exports: ModuleExports): PatchExportResult<PatchDefinition> {
  const value = exportedValue(exports);
  const parsed = patchSchema.safeParse(value);

  if (!parsed.success) {
    return { valid: false, errors: issues(parsed.error) };
  }

  const { name, onLoaded } = parsed.data;
  return {
    valid: true,
    definition: {
      name,
      onLoaded: (ctx) => onLoaded.call(value, ctx),
    },
  };
}
