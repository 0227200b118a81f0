// Tests for participants

import { describe, it, expect } from 'vitest';
import type { ParticipantManifest } from '@patchwork/protocol';
import { createInMemoryArchive, createInMemoryConfigRepository } from '@patchwork/repositories';
import { Config } from '../config/index.js';
import { PatchLoadError } from '../errors.js';
import { DeferredLogBuffer, Logger, createCapturingHandler } from '../logging/index.js';
import {
  ResolutionPool,
  createPatchModuleSource,
  createStaticEvaluator,
  type StaticModule,
} from '../resolution/index.js';
import { JsonConverter, Serializer } from '../serialization/index.js';
import { Participant } from './participant.js';

// --- Test Fixtures ---

class TagConverter extends JsonConverter<Set<string>, string[]> {
  readonly name = 'tags';

  isApplicable(value: unknown): value is Set<string> {
    return value instanceof Set;
  }

  serialize(value: Set<string>): string[] {
    return Array.from(value);
  }

  deserialize(json: string[]): Set<string> {
    return new Set(json);
  }
}

const noop = () => {};

async function createParticipant(
  manifest: Partial<ParticipantManifest>,
  modules: Record<string, StaticModule>,
  isGamePack = false
) {
  const buffer = new DeferredLogBuffer();
  const handler = createCapturingHandler();
  buffer.attach(handler);
  const logger = new Logger(buffer, 'participant');
  const serializer = new Serializer();

  const fullManifest: ParticipantManifest = {
    id: 'better-ui',
    version: '1.0.0',
    title: 'Better UI',
    earlyPatches: [],
    patches: [],
    ...manifest,
  };
  const files: Record<string, string> = { 'manifest.json': '{}' };
  for (const identity of Object.keys(modules)) {
    files[identity.slice(identity.indexOf(':') + 1)] = '';
  }
  const archive = createInMemoryArchive('/game/mods/better-ui.pak', files);
  const config = await Config.load(fullManifest.id, {
    repository: createInMemoryConfigRepository(),
    serializer,
    logger,
  });
  const participant = new Participant(
    '/game/mods/better-ui.pak',
    isGamePack,
    fullManifest,
    archive,
    config,
    logger
  );
  const patchPool = new ResolutionPool(
    'patch',
    createPatchModuleSource({ owners: () => [participant], evaluator: createStaticEvaluator(modules) }),
    logger
  );

  return { participant, patchPool, serializer, handler };
}

// --- Tests ---

describe('Participant.loadEarlyPatches', () => {
  it('should create early patches in manifest order', async () => {
    const { participant, patchPool } = await createParticipant(
      { earlyPatches: ['early/b.js', 'early/a.js'] },
      {
        'better-ui:early/b.js': { default: { name: 'Second', targets: ['Core'], prepatch: noop } },
        'better-ui:early/a.js': { name: 'First', targets: [], prepatch: noop },
      }
    );

    expect(await participant.loadEarlyPatches(patchPool)).toBe(true);
    expect(participant.earlyPatches.map((patch) => patch.name)).toEqual(['Second', 'First']);
    expect(participant.earlyPatches[0].targets).toEqual(['Core']);
    expect(participant.earlyPatchLoadError).toBeNull();
  });

  it('should keep the list empty and record the error when a module is invalid', async () => {
    const { participant, patchPool, handler } = await createParticipant(
      { earlyPatches: ['early/good.js', 'early/bad.js'] },
      {
        'better-ui:early/good.js': { name: 'Good', targets: [], prepatch: noop },
        'better-ui:early/bad.js': { name: 'Bad', targets: [] },
      }
    );

    expect(await participant.loadEarlyPatches(patchPool)).toBe(false);
    expect(participant.earlyPatches).toEqual([]);
    expect(participant.earlyPatchLoadError).toBeInstanceOf(PatchLoadError);
    expect(participant.earlyPatchLoadError?.message).toBe(
      'Module early/bad.js of participant [Better UI] is not a valid patch: prepatch: Expected a function'
    );
    expect(handler.at('error').map((entry) => entry.message)).toEqual([
      'Failed to load early patches of participant [Better UI]',
    ]);
  });

  it('should record a module that fails to resolve', async () => {
    const { participant, patchPool } = await createParticipant({ earlyPatches: ['early/missing.js'] }, {});

    await participant.loadEarlyPatches(patchPool);

    expect(participant.earlyPatchLoadError?.message).toBe(
      'Failed to resolve module better-ui:early/missing.js in the patch pool: ' +
        'Entry early/missing.js not found in archive /game/mods/better-ui.pak'
    );
  });

  it('should only load once', async () => {
    const { participant, patchPool } = await createParticipant(
      { earlyPatches: ['early/a.js'] },
      { 'better-ui:early/a.js': { name: 'First', targets: [], prepatch: noop } }
    );

    await participant.loadEarlyPatches(patchPool);
    const loaded = participant.earlyPatches;
    await participant.loadEarlyPatches(patchPool);

    expect(participant.earlyPatches).toBe(loaded);
  });
});

describe('Participant.loadPatches', () => {
  it('should add converters exported by game pack patch modules', async () => {
    const { participant, patchPool, serializer } = await createParticipant(
      { patches: ['patches/tags.js'] },
      { 'better-ui:patches/tags.js': { default: { name: 'Tags', onLoaded: noop }, TagConverter } },
      true
    );

    expect(await participant.loadPatches(patchPool, serializer)).toBe(true);
    expect(participant.patches.map((patch) => patch.name)).toEqual(['Tags']);
    expect(serializer.converters).toEqual(['tags']);
  });

  it('should ignore converters exported by mods', async () => {
    const { participant, patchPool, serializer } = await createParticipant(
      { patches: ['patches/tags.js'] },
      { 'better-ui:patches/tags.js': { default: { name: 'Tags', onLoaded: noop }, TagConverter } }
    );

    await participant.loadPatches(patchPool, serializer);

    expect(serializer.converters).toEqual([]);
  });

  it('should describe itself by kind and title', async () => {
    const { participant } = await createParticipant({}, {}, true);

    expect(String(participant)).toBe('Game pack [Better UI]');
    expect(participant.owner).toEqual({ id: 'better-ui', title: 'Better UI', isGamePack: true });
  });
});
