// =============================================================================
// BindingResolverPort — Contract for resolving state bindings at render time
// =============================================================================

import type { ApplicationState, PropertyValue, ResolvedProperties } from "../types.js";

export interface BindingResolverPort {
  /**
   * Replace every binding descriptor in `properties` with the current value of
   * its state key, or an `UnresolvedBinding` marker when the key is absent.
   */
  resolve(
    properties: Readonly<Record<string, PropertyValue>>,
    state: ApplicationState,
  ): ResolvedProperties;

  /** Return the state key when `value` is a binding descriptor. */
  bindingKeyOf(value: unknown): string | undefined;
}
