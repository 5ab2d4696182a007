// ---------------------------------------------------------------------------
// Host context
// ---------------------------------------------------------------------------

/**
 * The slice of the host process the loader needs.
 *
 * Host-bound helpers receive this as their first argument.
 */
export interface HostContext {
  /** Configuration directory; custom integrations live under it. */
  readonly configDir: string | undefined;
  /** When set, custom integrations are never discovered. */
  readonly safeMode: boolean;
}

// ---------------------------------------------------------------------------
// Host binding
// ---------------------------------------------------------------------------

/** Marks a function whose first parameter is the host context. */
export interface HostBoundFunction<A extends readonly unknown[] = readonly unknown[], R = unknown> {
  readonly kind: "host-bound";
  readonly fn: (host: HostContext, ...args: A) => R;
}

/**
 * Declare a module export as host-bound. Module handles supply the host
 * context automatically when such an export is fetched.
 */
export function bindHost<A extends readonly unknown[], R>(
  fn: (host: HostContext, ...args: A) => R,
): HostBoundFunction<A, R> {
  return Object.freeze({ kind: "host-bound" as const, fn });
}

export function isHostBound(value: unknown): value is HostBoundFunction {
  return (
    value !== null &&
    typeof value === "object" &&
    "kind" in value &&
    value.kind === "host-bound" &&
    "fn" in value &&
    typeof value.fn === "function"
  );
}
