// =============================================================================
// StateBindingResolver — Resolves binding descriptors against application state
// =============================================================================

import type { BindingResolverPort } from "../../ports/binding-resolver.port.js";
import {
  UnresolvedBinding,
  type ApplicationState,
  type PropertyValue,
  type ResolvedProperties,
} from "../../types.js";

export interface StateBindingResolverOptions {
  /** Key that marks an object as a binding descriptor (default: "$bind"). */
  bindingKey?: string;
}

export const DEFAULT_BINDING_KEY = "$bind";

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Literals pass through; `{ "$bind": "key" }` becomes `state.get("key")`, or an
 * {@link UnresolvedBinding} when the key is absent. Descriptors nested in arrays
 * and objects are resolved as well. Nothing is cached between calls.
 */
export class StateBindingResolver implements BindingResolverPort {
  private readonly bindingKey: string;

  constructor(options?: StateBindingResolverOptions) {
    this.bindingKey = options?.bindingKey ?? DEFAULT_BINDING_KEY;
  }

  resolve(
    properties: Readonly<Record<string, PropertyValue>>,
    state: ApplicationState,
  ): ResolvedProperties {
    const resolved: ResolvedProperties = {};
    for (const [name, value] of Object.entries(properties)) {
      resolved[name] = this.resolveValue(value, state);
    }
    return resolved;
  }

  bindingKeyOf(value: unknown): string | undefined {
    if (!isPlainObject(value)) return undefined;
    const key = value[this.bindingKey];
    return typeof key === "string" && key.length > 0 ? key : undefined;
  }

  private resolveValue(value: unknown, state: ApplicationState): unknown {
    const key = this.bindingKeyOf(value);
    if (key !== undefined) {
      return state.has(key) ? state.get(key) : new UnresolvedBinding(key);
    }
    if (Array.isArray(value)) {
      return value.map((item) => this.resolveValue(item, state));
    }
    if (isPlainObject(value)) {
      const out: Record<string, unknown> = {};
      for (const [k, v] of Object.entries(value)) out[k] = this.resolveValue(v, state);
      return out;
    }
    return value;
  }
}
