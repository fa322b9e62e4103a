/**
 * `error` reports an import whose bare name is also declared locally;
 * `allow` lets the local declaration shadow it silently.
 */
export type LocalShadowingPolicy = "error" | "allow";

export const LOCAL_SHADOWING_POLICIES = ["error", "allow"] as const satisfies readonly LocalShadowingPolicy[];

export interface ResolverOptions {
  localShadowing: LocalShadowingPolicy;
  /** Lets `a::X` find `a` among the root's children when the current module has none. */
  rootFallback: boolean;
}

export const DEFAULT_RESOLVER_OPTIONS: ResolverOptions = {
  localShadowing: "error",
  rootFallback: true,
};

export const resolveOptions = (
  options: Partial<ResolverOptions> = {},
): ResolverOptions => ({
  localShadowing: options.localShadowing ?? DEFAULT_RESOLVER_OPTIONS.localShadowing,
  rootFallback: options.rootFallback ?? DEFAULT_RESOLVER_OPTIONS.rootFallback,
});
