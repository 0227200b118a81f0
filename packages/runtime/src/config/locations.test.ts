// Tests for locations

import { describe, it, expect } from 'vitest';
import type { LocationConfig } from '@patchwork/protocol';
import { createInMemoryFileSystem } from '@patchwork/repositories';
import { LocationResolver, ModLocation, defaultLocations, locationConfigSchema } from './locations.js';

// --- Test Fixtures ---

const fileSystem = createInMemoryFileSystem([
  '/game/gamepacks/base.pak',
  '/game/gamepacks/notes.txt',
  '/game/gamepacks/nested/extra.pak',
  '/game/mods/a.pak',
  '/game/mods/B.PAK',
  '/game/mods/disabled/c.pak',
  '/game/mods/deep/d.pak',
]);

function createResolver(config: LocationConfig = defaultLocations()): LocationResolver {
  return new LocationResolver(() => config, fileSystem, '/game');
}

// --- Tests ---

describe('locationConfigSchema', () => {
  it('should fill mod location defaults', () => {
    const parsed = locationConfigSchema.parse({
      configs: 'cfg',
      gamePacks: 'packs',
      libs: 'lib',
      mods: [{ path: 'extra' }],
    });

    expect(parsed.mods).toEqual([{ path: 'extra', recursive: true, ignorePatterns: [] }]);
  });

  it('should reject ignore patterns that are not valid regular expressions', () => {
    const result = locationConfigSchema.safeParse({
      ...defaultLocations(),
      mods: [{ path: './mods', ignorePatterns: ['/disabled/', '(['] }],
    });

    expect(result.success).toBe(false);
    expect(result.error?.issues.map((issue) => [issue.path.join('.'), issue.message])).toEqual([
      ['mods.0.ignorePatterns.1', 'Invalid regular expression'],
    ]);
  });
});

describe('LocationResolver', () => {
  it('should resolve locations against the base directory', () => {
    const resolver = createResolver();

    expect(resolver.configs).toBe('/game/config');
    expect(resolver.gamePacks).toBe('/game/gamepacks');
    expect(resolver.libs).toBe('/game/libs');
    expect(resolver.directories()).toEqual(['/game/config', '/game/gamepacks', '/game/libs', '/game/mods']);
  });

  it('should find game packs at the top level only', async () => {
    expect(await createResolver().searchGamePacks()).toEqual(['/game/gamepacks/base.pak']);
  });

  it('should follow config changes', () => {
    let config = defaultLocations();
    const resolver = new LocationResolver(() => config, fileSystem, '/game');

    config = { ...config, libs: '/shared/libs' };

    expect(resolver.libs).toBe('/shared/libs');
  });
});

describe('ModLocation', () => {
  it('should search recursively and skip ignored paths', async () => {
    const location = new ModLocation('/game/mods', true, ['/disabled/'], fileSystem);

    expect(await location.search()).toEqual([
      '/game/mods/B.PAK',
      '/game/mods/a.pak',
      '/game/mods/deep/d.pak',
    ]);
    expect(String(location)).toBe('/game/mods (recursive)');
  });

  it('should stay at the top level when not recursive', async () => {
    const location = new ModLocation('/game/mods', false, [], fileSystem);

    expect(await location.search()).toEqual(['/game/mods/B.PAK', '/game/mods/a.pak']);
    expect(String(location)).toBe('/game/mods');
  });

  it('should fail the search, not the construction, for an invalid ignore pattern', async () => {
    const location = new ModLocation('/game/mods', true, ['(['], fileSystem);

    expect(location.directory).toBe('/game/mods');
    await expect(location.search()).rejects.toThrow(SyntaxError);
  });

  it('should fail for a missing directory', async () => {
    await expect(new ModLocation('/game/nowhere', true, [], fileSystem).search()).rejects.toThrow('ENOENT');
  });
});
