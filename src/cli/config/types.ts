import type { ItemKind } from "../../modules/types.js";
import type { LocalShadowingPolicy } from "../../semantics/options.js";

export type OutputFormat = "text" | "json" | "msgpack";

export type ModscopeCommand = "check" | "query";

export type ModscopeConfig = {
  command: ModscopeCommand;
  /** Path of the JSON unit description */
  unit: string;
  /** Module key the query paths are resolved from */
  module?: string;
  /** Paths to resolve with `query` */
  paths: string[];
  /** Restricts `query` lookups to these item kinds */
  kinds?: ItemKind[];
  format: OutputFormat;
  localShadowing: LocalShadowingPolicy;
  rootFallback: boolean;
  /** ANSI colours in diagnostics */
  color: boolean;
  /** Print phase timings and counters to stderr */
  verbose: boolean;
};
