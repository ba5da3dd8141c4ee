/**
 * Check registry
 *
 * Immutable lookup from check name to implementation. The engine's own
 * structural checks are merged ahead of, and shadow, caller primitives.
 *
 * @module validation/registry
 */

import type { CheckFn, CheckImpl, CheckName, CheckRegistry } from "./types.js";

export const INNER_CHECK = "inner";

export const STRUCTURAL_CHECKS: ReadonlyArray<readonly [CheckName, CheckImpl]> = [
  [INNER_CHECK, { kind: "structural", structure: "inner" }],
];

export type PrimitiveChecks =
  | Readonly<Record<CheckName, CheckFn>>
  | ReadonlyMap<CheckName, CheckFn>;

function isCheckMap(primitives: PrimitiveChecks): primitives is ReadonlyMap<CheckName, CheckFn> {
  return primitives instanceof Map;
}

class FrozenRegistry extends Map<CheckName, CheckImpl> {
  private frozen = false;

  constructor(entries: Iterable<readonly [CheckName, CheckImpl]>) {
    super(entries);
    this.frozen = true;
  }

  override set(key: CheckName, value: CheckImpl): this {
    if (this.frozen) {
      throw new TypeError(`Check registry is read-only (attempted to set "${key}")`);
    }
    return super.set(key, value);
  }

  override delete(key: CheckName): boolean {
    throw new TypeError(`Check registry is read-only (attempted to delete "${key}")`);
  }

  override clear(): void {
    throw new TypeError("Check registry is read-only");
  }
}

/**
 * Build a registry from caller-supplied primitive checks.
 */
export function createCheckRegistry(primitives: PrimitiveChecks = {}): CheckRegistry {
  const entries: Array<readonly [CheckName, CheckFn]> = isCheckMap(primitives)
    ? [...primitives.entries()]
    : Object.entries(primitives);
  const merged = new Map<CheckName, CheckImpl>();

  for (const [name, impl] of STRUCTURAL_CHECKS) {
    merged.set(name, impl);
  }
  for (const [name, fn] of entries) {
    if (merged.has(name)) continue;
    merged.set(name, { kind: "primitive", fn });
  }

  return new FrozenRegistry(merged);
}

export function resolveCheck(registry: CheckRegistry, name: CheckName): CheckImpl | undefined {
  return registry.get(name);
}
