/**
 * Conversion of the mutable record into the immutable snapshot.
 *
 * @packageDocumentation
 */

import type { GlobalConfig, GlobalData } from './types.js';

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null) {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Copies the record and freezes the copy recursively.
 *
 * Later mutation of `data` does not reach the snapshot.
 *
 * @param data - The record a parse pass assembled.
 * @returns A deep-frozen copy.
 */
export function snapshotGlobalData(data: GlobalData): GlobalConfig {
  return deepFreeze(structuredClone(data));
}

/**
 * Renders a snapshot as stable JSON. Unset fields are written as `null`, so
 * two snapshots with the same content serialise to identical text.
 *
 * @param config - The snapshot to render.
 * @param indent - Indentation passed to JSON.stringify.
 */
export function serializeGlobalConfig(config: GlobalConfig, indent?: number): string {
  return JSON.stringify(config, (_key, value: unknown) => (value === undefined ? null : value), indent);
}
