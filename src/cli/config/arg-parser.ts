import { Command, InvalidArgumentError } from "commander";
import { createRequire } from "node:module";
import { ITEM_KINDS, type ItemKind } from "../../modules/types.js";
import {
  LOCAL_SHADOWING_POLICIES,
  type LocalShadowingPolicy,
} from "../../semantics/options.js";
import type { ModscopeConfig, OutputFormat } from "./types.js";

const require = createRequire(import.meta.url);
const { version } = require("../../../package.json") as { version: string };

const OUTPUT_FORMATS = ["text", "json", "msgpack"] as const satisfies readonly OutputFormat[];

const DEFAULT_UNIT = "./modscope.json";

type SharedOptions = {
  format: OutputFormat;
  localShadowing: LocalShadowingPolicy;
  rootFallback: boolean;
  color: boolean;
  verbose?: boolean;
};

const pickAllowed = <T extends string>(
  allowed: readonly T[],
  value: string,
  label: string,
): T => {
  const normalized = value.toLowerCase();
  const match = allowed.find((candidate) => candidate === normalized);
  if (match === undefined) {
    throw new InvalidArgumentError(
      `invalid ${label} "${value}" (allowed: ${allowed.join(", ")})`,
    );
  }
  return match;
};

export const parseOutputFormat = (value: string): OutputFormat =>
  pickAllowed(OUTPUT_FORMATS, value, "output format");

export const parseLocalShadowing = (value: string): LocalShadowingPolicy =>
  pickAllowed(LOCAL_SHADOWING_POLICIES, value, "local shadowing policy");

const appendItemKind = (value: string, previous: ItemKind[]): ItemKind[] => [
  ...previous,
  pickAllowed(ITEM_KINDS, value, "item kind"),
];

const createBaseCommand = ({
  name,
  description,
}: {
  name: string;
  description: string;
}): Command =>
  new Command()
    .name(name)
    .description(description)
    .version(version, "-v, --version", "display the current version")
    .helpOption("-h, --help", "display help for command")
    .option(
      "--format <format>",
      `output format (${OUTPUT_FORMATS.join("|")})`,
      parseOutputFormat,
      "text",
    )
    .option(
      "--local-shadowing <policy>",
      "report imports that collide with local declarations (error|allow)",
      parseLocalShadowing,
      "error",
    )
    .option(
      "--no-root-fallback",
      "do not look up an unknown first path segment among the root's children",
    )
    .option("--no-color", "disable ANSI colours in diagnostics")
    .option("--verbose", "print phase timings and counters");

const sharedConfig = (opts: SharedOptions) => ({
  format: opts.format,
  localShadowing: opts.localShadowing,
  rootFallback: opts.rootFallback,
  color: opts.color,
  verbose: Boolean(opts.verbose),
});

const parseCheckConfig = (argv: readonly string[]): ModscopeConfig => {
  const program = createBaseCommand({
    name: "modscope",
    description: "Resolve module paths and imports of a compilation unit",
  });

  program
    .argument("[unit]", `unit description (default: ${DEFAULT_UNIT})`)
    .addHelpText(
      "after",
      ["", "Commands:", "  query <unit> --module <key> <path...>  resolve paths from one module"].join(
        "\n",
      ),
    );

  program.parse(["node", "modscope", ...argv]);
  const opts = program.opts<SharedOptions>();
  const [unitArg] = program.args;

  return {
    command: "check",
    unit: unitArg ?? DEFAULT_UNIT,
    paths: [],
    ...sharedConfig(opts),
  };
};

const parseQueryConfig = (argv: readonly string[]): ModscopeConfig => {
  const program = createBaseCommand({
    name: "modscope query",
    description: "Resolve paths as written in one module",
  });

  program
    .argument("<unit>", "unit description")
    .argument("<path...>", "paths to resolve")
    .requiredOption("-m, --module <key>", "module key the paths are written in")
    .option("--kind <kind>", "restrict lookups to an item kind (repeatable)", appendItemKind, []);

  program.parse(["node", "modscope query", ...argv]);
  const opts = program.opts<SharedOptions & { module: string; kind: ItemKind[] }>();
  const [unitArg, ...paths] = program.args;

  return {
    command: "query",
    unit: unitArg ?? DEFAULT_UNIT,
    module: opts.module,
    paths,
    ...(opts.kind.length > 0 ? { kinds: opts.kind } : {}),
    ...sharedConfig(opts),
  };
};

const findSubcommandIndex = (args: readonly string[]): number => {
  const optionsWithValues = new Set([
    "--format",
    "--local-shadowing",
    "--module",
    "-m",
    "--kind",
  ]);

  let index = 0;
  while (index < args.length) {
    const arg = args[index];
    if (arg === "query") {
      return index;
    }

    if (arg === undefined || arg === "--") {
      return -1;
    }

    if (optionsWithValues.has(arg)) {
      index += 2;
      continue;
    }

    index += 1;
  }

  return -1;
};

export const getConfigFromCli = (): ModscopeConfig => {
  const args = process.argv.slice(2);
  const commandIndex = findSubcommandIndex(args);
  if (commandIndex < 0) {
    return parseCheckConfig(args);
  }

  const rest = args.filter((_, index) => index !== commandIndex);
  return parseQueryConfig(rest);
};

let config: ModscopeConfig | undefined = undefined;

export const getConfig = (): ModscopeConfig => {
  if (config) {
    return config;
  }
  config = getConfigFromCli();
  return config;
};
