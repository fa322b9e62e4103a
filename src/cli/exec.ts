import { encode } from "@msgpack/msgpack";
import {
  DiagnosticError,
  diagnosticFromCode,
  hasErrors,
  type Diagnostic,
} from "../diagnostics/index.js";
import { formatPerfSummary, isPerfEnabledByEnv, PerfRecorder } from "../perf.js";
import { encodeReport } from "../report/codec.js";
import { createReport, reportToJson } from "../report/report.js";
import { analyzeUnit, type AnalysisResult } from "../semantics/pipeline.js";
import { createFsUnitHost, type UnitHost } from "../unit/host.js";
import { loadUnitFile, UnitFormatError } from "../unit/load.js";
import { getConfig } from "./config/arg-parser.js";
import type { ModscopeConfig } from "./config/types.js";
import { formatCliDiagnostic, type SourceReader } from "./diagnostics.js";
import { formatQueryLine, formatSummary, toQueryOutput } from "./output.js";

export type CliIo = {
  stdout: (chunk: string | Uint8Array) => void;
  stderr: (text: string) => void;
  host: UnitHost;
  /** Source text for diagnostic snippets; the file system when omitted. */
  readSource?: SourceReader;
};

const processIo = (): CliIo => ({
  stdout: (chunk) => {
    process.stdout.write(chunk);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  host: createFsUnitHost(),
});

export const exec = () => main().catch(errorHandler);

async function main() {
  process.exitCode = await runCli(getConfig(), processIo());
}

/** Runs one CLI invocation; resolves to the process exit code. */
export const runCli = async (config: ModscopeConfig, io: CliIo): Promise<number> => {
  const perf = new PerfRecorder(config.verbose || isPerfEnabledByEnv());
  const unit = await loadUnitFile(config.unit, io.host);
  const result = analyzeUnit(unit, {
    localShadowing: config.localShadowing,
    rootFallback: config.rootFallback,
    perf,
  });

  const printDiagnostics = (diagnostics: readonly Diagnostic[]) => {
    diagnostics.forEach((diagnostic) => {
      io.stderr(
        `${formatCliDiagnostic(diagnostic, { color: config.color, readSource: io.readSource })}\n`,
      );
    });
  };

  const exitCode =
    config.command === "query"
      ? runQuery({ config, result, io, printDiagnostics })
      : runCheck({ config, result, io, printDiagnostics });

  if (perf.enabled) {
    io.stderr(
      `${formatPerfSummary({ unit: config.unit, diagnostics: result.diagnostics.length, perf })}\n`,
    );
  }
  return exitCode;
};

type CommandContext = {
  config: ModscopeConfig;
  result: AnalysisResult;
  io: CliIo;
  printDiagnostics: (diagnostics: readonly Diagnostic[]) => void;
};

const runCheck = ({ config, result, io, printDiagnostics }: CommandContext): number => {
  switch (config.format) {
    case "json":
      io.stdout(`${reportToJson(createReport(result))}\n`);
      break;
    case "msgpack":
      io.stdout(encodeReport(createReport(result)));
      break;
    case "text":
      printDiagnostics(result.diagnostics);
      io.stdout(`${formatSummary(result)}\n`);
      break;
  }
  return hasErrors(result.diagnostics) ? 1 : 0;
};

const runQuery = ({ config, result, io, printDiagnostics }: CommandContext): number => {
  const key = config.module ?? "";
  const module = result.tree.byKey.get(key);
  if (module === undefined) {
    const root = result.tree.modules[result.tree.root];
    throw new DiagnosticError(
      diagnosticFromCode({
        code: "RS0001",
        params: { kind: "unknown-module", segment: key, module: "the unit" },
        span: { file: root?.source.file ?? config.unit, start: 0, end: 0 },
      }),
    );
  }

  const file = result.tree.modules[module]?.source.file ?? config.unit;
  const references = config.paths.map((path) =>
    result.resolver.resolve({
      module,
      path,
      span: { file, start: 0, end: 0 },
      kinds: config.kinds,
    }),
  );
  const outputs = references.map((reference) => toQueryOutput(result.resolver, reference));

  switch (config.format) {
    case "json":
      io.stdout(`${JSON.stringify(outputs, undefined, 2)}\n`);
      break;
    case "msgpack":
      io.stdout(encode(outputs));
      break;
    case "text":
      printDiagnostics(
        references.flatMap((reference) =>
          reference.kind === "error" ? [reference.diagnostic] : [],
        ),
      );
      outputs.forEach((output) => io.stdout(`${formatQueryLine(output)}\n`));
      break;
  }
  return references.some((reference) => reference.kind === "error") ? 1 : 0;
};

function errorHandler(error: unknown) {
  if (error instanceof DiagnosticError) {
    error.diagnostics.forEach((diagnostic) => {
      console.error(formatCliDiagnostic(diagnostic, { color: getConfig().color }));
    });
    process.exit(1);
  }

  if (error instanceof UnitFormatError) {
    console.error(`invalid unit description: ${error.message}`);
    process.exit(1);
  }

  console.error(error);
  process.exit(1);
}
