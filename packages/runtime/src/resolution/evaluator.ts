// Module evaluators - turn module definitions into exports

import type { ModuleDefinition, ModuleExports } from '@patchwork/protocol';
import { NodeVM } from 'vm2';

/**
 * Evaluates a module definition into its exports
 */
export type ModuleEvaluator = (definition: ModuleDefinition) => Promise<ModuleExports>;

/**
 * Options for the sandbox evaluator
 */
export type SandboxEvaluatorOptions = {
  /**
   * Node built-in modules the evaluated code may require
   */
  builtin?: string[];

  /**
   * Globals made available to the evaluated code
   */
  sandbox?: Record<string, unknown>;

  /**
   * Host values the evaluated code can `require` by name
   */
  modules?: Record<string, unknown>;
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * Exports as a record: objects as they are, anything else under `default`.
 */
export function toModuleExports(value: unknown): ModuleExports {
  return isRecord(value) ? value : { default: value };
}

/**
 * Create an evaluator running CommonJS source in a vm2 NodeVM.
 */
export function createSandboxEvaluator(options: SandboxEvaluatorOptions = {}): ModuleEvaluator {
  return async (definition) => {
    const vm = new NodeVM({
      console: 'inherit',
      sandbox: options.sandbox ?? {},
      require: {
        external: false,
        builtin: options.builtin ?? [],
        mock: options.modules ?? {},
      },
    });

    const exported: unknown = vm.run(definition.source, definition.location);
    return toModuleExports(exported);
  };
}

/**
 * A fixed module: its exports, or a function building them from the definition
 */
export type StaticModule = ModuleExports | ((definition: ModuleDefinition) => ModuleExports);

/**
 * Create an evaluator over fixed modules keyed by identity (for testing and
 * for hosts whose modules are already in memory).
 */
export function createStaticEvaluator(modules: Record<string, StaticModule>): ModuleEvaluator {
  return async (definition) => {
    const module = modules[definition.identity];
    if (module === undefined) {
      throw new Error(`No module registered for ${definition.identity}`);
    }
    return typeof module === 'function' ? module(definition) : module;
  };
}
