// Config scopes
//
// A Config is one persisted scope (the orchestrator's own, or one per
// participant). It is made of sections, each typed by a zod schema with
// defaults. Changing a section fires the scope's own handlers first and the
// hub's global handlers after them.

import type { z } from 'zod';
import type { ConfigRepository } from '@patchwork/repositories';
import { ConfigSectionConflictError, ConfigValidationError } from '../errors.js';
import { errorData, type Logger } from '../logging/index.js';
import type { Serializer } from '../serialization/index.js';
import { tryInvokeAll } from '../util/invoke.js';

/**
 * Definition of a typed config section
 */
export type ConfigSectionDefinition<T> = {
  /**
   * Key of the section inside its scope
   */
  id: string;

  description?: string;

  schema: z.ZodType<T, z.ZodTypeDef, unknown>;

  defaults: () => T;
};

export function defineConfigSection<T>(
  definition: ConfigSectionDefinition<T>
): ConfigSectionDefinition<T> {
  return definition;
}

/**
 * Event fired after a section value changed
 */
export type ConfigChangedEvent = {
  ownerId: string;
  sectionId: string;
  previous: unknown;
  value: unknown;
};

export type ConfigChangedHandler = (event: ConfigChangedEvent) => void | Promise<void>;

/**
 * Global change notification: subscribers hear about every scope's changes,
 * after that scope's own handlers ran.
 */
export class ConfigChangeHub {
  private readonly handlers = new Set<ConfigChangedHandler>();

  constructor(private readonly logger: Logger) {}

  subscribe(handler: ConfigChangedHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  async fire(event: ConfigChangedEvent): Promise<void> {
    try {
      await tryInvokeAll(Array.from(this.handlers, (handler) => () => handler(event)));
    } catch (error) {
      this.logger.error(
        'Some config change subscribers threw an exception',
        aggregateData(error)
      );
    }
  }
}

function aggregateData(error: unknown): Record<string, unknown> {
  if (error instanceof AggregateError) {
    return {
      error: error.message,
      errors: error.errors.map((inner) => (inner instanceof Error ? inner.message : String(inner))),
    };
  }
  return errorData(error);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * What a scope needs to save a section
 */
type SectionHandle = {
  readonly id: string;
  readonly current: unknown;
};

/**
 * One loaded section of a config scope
 */
export class ConfigSection<T> implements SectionHandle {
  constructor(
    readonly definition: ConfigSectionDefinition<T>,
    private value: T,
    private readonly config: Config
  ) {}

  get id(): string {
    return this.definition.id;
  }

  get current(): T {
    return this.value;
  }

  /**
   * Replace the section value. The new value is validated first.
   * @throws ConfigValidationError when the schema rejects the value
   */
  async set(next: T): Promise<void> {
    const parsed = this.definition.schema.safeParse(next);
    if (!parsed.success) {
      throw new ConfigValidationError(
        this.config.ownerId,
        this.id,
        parsed.error.issues.map((issue) => `${issue.path.join('.') || this.id}: ${issue.message}`)
      );
    }

    const previous = this.value;
    this.value = parsed.data;
    await this.config.notifyChanged({
      ownerId: this.config.ownerId,
      sectionId: this.id,
      previous,
      value: parsed.data,
    });
  }

  /**
   * Update part of the section value
   */
  async update(changes: Partial<T>): Promise<void> {
    await this.set({ ...this.value, ...changes });
  }

  async reset(): Promise<void> {
    await this.set(this.definition.defaults());
  }
}

/**
 * Collaborators of a config scope
 */
export type ConfigOptions = {
  repository: ConfigRepository;
  serializer: Serializer;
  logger: Logger;
  hub?: ConfigChangeHub;
};

export class Config {
  private readonly sections = new Map<string, SectionHandle>();
  private readonly handlers = new Set<ConfigChangedHandler>();

  private constructor(
    readonly ownerId: string,
    private readonly stored: Record<string, unknown>,
    private readonly options: ConfigOptions
  ) {}

  /**
   * Load a scope from the repository. A missing document starts empty; an
   * unreadable one is logged and also starts empty.
   */
  static async load(ownerId: string, options: ConfigOptions): Promise<Config> {
    const document = await options.repository.load(ownerId);
    let stored: Record<string, unknown> = {};

    if (document) {
      try {
        const parsed = options.serializer.parse(document.content);
        if (isRecord(parsed)) {
          stored = parsed;
        } else {
          options.logger.warn(`Config document of ${ownerId} is not an object, using defaults`);
        }
      } catch (error) {
        options.logger.warn(`Config document of ${ownerId} could not be parsed, using defaults`, errorData(error));
      }
    }

    return new Config(ownerId, stored, options);
  }

  /**
   * Ids of the loaded sections
   */
  get sectionIds(): string[] {
    return Array.from(this.sections.keys());
  }

  /**
   * Load a section from the stored values, falling back to its defaults when
   * nothing valid is stored.
   * @throws ConfigSectionConflictError when the id is already loaded
   */
  loadSection<T>(definition: ConfigSectionDefinition<T>): ConfigSection<T> {
    if (this.sections.has(definition.id)) {
      throw new ConfigSectionConflictError(this.ownerId, definition.id);
    }

    let value = definition.defaults();
    if (definition.id in this.stored) {
      const parsed = definition.schema.safeParse(this.stored[definition.id]);
      if (parsed.success) {
        value = parsed.data;
      } else {
        this.options.logger.warn(
          () => `Stored value of config section ${definition.id} of ${this.ownerId} is invalid, using defaults`,
          { issues: parsed.error.issues.map((issue) => issue.message) }
        );
      }
    }

    const section = new ConfigSection(definition, value, this);
    this.sections.set(definition.id, section);
    return section;
  }

  /**
   * Subscribe to this scope's changes
   */
  onChanged(handler: ConfigChangedHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  /**
   * Run this scope's handlers, then the hub's. Handler errors are logged,
   * never thrown.
   */
  async notifyChanged(event: ConfigChangedEvent): Promise<void> {
    try {
      await tryInvokeAll(Array.from(this.handlers, (handler) => () => handler(event)));
    } catch (error) {
      this.options.logger.error(
        `Some change subscribers of config ${this.ownerId} threw an exception`,
        aggregateData(error)
      );
    }

    await this.options.hub?.fire(event);
  }

  /**
   * Persist the scope. Stored sections that were never loaded are kept.
   * @throws whatever the repository or serializer throws
   */
  async save(): Promise<void> {
    const values: Record<string, unknown> = { ...this.stored };
    for (const section of this.sections.values()) {
      values[section.id] = section.current;
    }

    await this.options.repository.save({
      ownerId: this.ownerId,
      content: this.options.serializer.stringify(values),
      updatedAt: new Date().toISOString(),
    });

    this.options.logger.debug(() => `Saved config ${this.ownerId}`);
  }
}
