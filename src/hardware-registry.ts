/**
 * Backend registry for hardware ports.
 *
 * Stores factory functions per port kind, keyed by backend ID. Backends
 * register themselves via registerBackend() and are instantiated on demand
 * via createBackend().
 */
import type { Logger } from "./logger.js";
import type { BackendInfo, PortKind, PortKinds } from "./hardware-types.js";

/** Settings handed to every backend factory */
export interface BackendOptions {
  readonly logger: Logger;
  /** Same-token suppression window for tag sources */
  readonly tagDedupMs: number;
  /** Minimum spacing between two presses of one button */
  readonly buttonDebounceMs: number;
  /** Line source for keyboard-wedge readers (defaults to stdin) */
  readonly input?: NodeJS.ReadableStream;
}

export type BackendFactory<T> = (options: BackendOptions) => T;

type Registries = { [K in PortKind]: Map<string, BackendFactory<PortKinds[K]>> };

const registries: Registries = {
  tags: new Map(),
  buttons: new Map(),
  leds: new Map(),
  buzzer: new Map(),
};

/** Register a backend factory. Throws if the ID is already taken for this kind. */
export function registerBackend<K extends PortKind>(
  kind: K,
  id: string,
  factory: BackendFactory<PortKinds[K]>,
): void {
  const registry: Map<string, BackendFactory<PortKinds[K]>> = registries[kind];
  if (registry.has(id)) {
    throw new Error(`Backend "${id}" is already registered for ${kind}`);
  }
  registry.set(id, factory);
}

/** Create a backend instance by kind and ID. Returns null if not found. */
export function createBackend<K extends PortKind>(
  kind: K,
  id: string,
  options: BackendOptions,
): PortKinds[K] | null {
  const registry: Map<string, BackendFactory<PortKinds[K]>> = registries[kind];
  const factory = registry.get(id);
  return factory ? factory(options) : null;
}

/** List backend IDs registered for a port kind. */
export function listBackends(kind: PortKind): string[] {
  return [...registries[kind].keys()];
}

/** Describe the backend a factory produces, for the startup banner. */
export function describeBackend(info: BackendInfo): string {
  return `${info.name} (${info.id})`;
}

/** Clear every registry (for testing). */
export function clearBackends(): void {
  for (const registry of Object.values(registries)) {
    registry.clear();
  }
}
