// Structured serializer with pluggable converters
//
// Wraps a private superjson instance. Converters teach it about types that do
// not survive JSON on their own. Game packs contribute converters by exporting
// JsonConverter subclasses from their patch modules.

import SuperJSON from 'superjson';
import type { ModuleExports } from '@patchwork/protocol';

/**
 * JSON-compatible value produced by a converter
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Base class for converters.
 *
 * Subclasses found by Serializer.addConverters are instantiated with no
 * arguments. Set `static ignored = true` to keep a subclass out of scans.
 */
export abstract class JsonConverter<TValue = unknown, TJson extends JsonValue = JsonValue> {
  static ignored = false;

  /**
   * Unique name, stored alongside serialized values
   */
  abstract readonly name: string;

  abstract isApplicable(value: unknown): value is TValue;

  abstract serialize(value: TValue): TJson;

  abstract deserialize(json: TJson): TValue;
}

/**
 * A converter type that can be instantiated without arguments
 */
export type JsonConverterClass = new () => JsonConverter;

function isConverterClass(value: unknown): value is JsonConverterClass {
  return (
    typeof value === 'function' &&
    value.prototype instanceof JsonConverter &&
    Reflect.get(value, 'ignored') !== true
  );
}

export class Serializer {
  private readonly instance = new SuperJSON();
  private readonly names = new Set<string>();

  /**
   * Names of the registered converters, in registration order
   */
  get converters(): string[] {
    return Array.from(this.names);
  }

  /**
   * Register a converter instance.
   * @returns false if a converter with the same name is already registered
   */
  addConverter(converter: JsonConverter): boolean {
    if (this.names.has(converter.name)) {
      return false;
    }

    this.instance.registerCustom<unknown, JsonValue>(
      {
        isApplicable: (value): value is unknown => converter.isApplicable(value),
        serialize: (value) => converter.serialize(value),
        deserialize: (json) => converter.deserialize(json),
      },
      converter.name
    );
    this.names.add(converter.name);
    return true;
  }

  /**
   * Instantiate and register a converter type.
   */
  addConverterType(converterType: JsonConverterClass): boolean {
    return this.addConverter(new converterType());
  }

  /**
   * Register every converter type exported by a module, except ignored ones.
   * @returns names of the converters that were added
   */
  addConverters(exports: ModuleExports): string[] {
    const added: string[] = [];

    for (const value of Object.values(exports)) {
      if (!isConverterClass(value)) {
        continue;
      }

      const converter = new value();
      if (this.addConverter(converter)) {
        added.push(converter.name);
      }
    }

    return added;
  }

  stringify(value: unknown): string {
    return this.instance.stringify(value);
  }

  parse(text: string): unknown {
    return this.instance.parse<unknown>(text);
  }
}
