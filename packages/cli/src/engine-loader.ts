import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import type { CheckpointTable } from "@ghostwalk/schemas";
import { EngineLoadError } from "@ghostwalk/schemas";
import type { Engine, EngineFactoryOptions, EngineModule } from "@ghostwalk/engine";
import { createSimulatedEngine } from "@ghostwalk/engine";

export const SCRIPTED_ENGINE = "scripted";

export interface LoadedEngine {
  engine: Engine;
  /** Cartridge RAM to persist at shutdown, when the adapter supports it. */
  exportSave(): Uint8Array | null;
}

export interface LoadEngineOptions extends EngineFactoryOptions {
  table?: Readonly<CheckpointTable>;
  /** Player name for the scripted engine. */
  name?: string;
}

function isEngineModule(value: unknown): value is EngineModule {
  return typeof value === "object"
    && value !== null
    && "createEngine" in value
    && typeof value.createEngine === "function";
}

/**
 * Resolves `--engine`: the built-in scripted overworld, or an ES module path/specifier
 * whose `createEngine` wraps a real emulator.
 */
export async function loadEngine(specifier: string, options: LoadEngineOptions = {}): Promise<LoadedEngine> {
  if (specifier === SCRIPTED_ENGINE) {
    const engine = createSimulatedEngine({
      ...(options.table !== undefined ? { table: options.table } : {}),
      ...(options.name !== undefined ? { name: options.name } : {}),
    });
    return { engine, exportSave: () => null };
  }

  const target = specifier.startsWith(".") || specifier.startsWith("/")
    ? pathToFileURL(resolve(specifier)).href
    : specifier;

  let mod: unknown;
  try {
    mod = await import(target);
  } catch (err) {
    throw new EngineLoadError(
      `Could not import engine adapter "${specifier}": ${err instanceof Error ? err.message : String(err)}`,
      specifier,
    );
  }
  if (!isEngineModule(mod)) {
    throw new EngineLoadError(`Engine adapter "${specifier}" does not export createEngine()`, specifier);
  }
  const adapter = mod;

  const factoryOptions: EngineFactoryOptions = {
    ...(options.romPath !== undefined ? { romPath: options.romPath } : {}),
    ...(options.save !== undefined ? { save: options.save } : {}),
  };
  let engine: Engine;
  try {
    engine = await adapter.createEngine(factoryOptions);
  } catch (err) {
    throw new EngineLoadError(
      `Engine adapter "${specifier}" failed to start: ${err instanceof Error ? err.message : String(err)}`,
      specifier,
    );
  }
  const started = engine;
  return { engine: started, exportSave: () => adapter.exportSave?.(started) ?? null };
}
