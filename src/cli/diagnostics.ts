import { readFileSync } from "node:fs";
import type {
  Diagnostic,
  DiagnosticSeverity,
  SourceSpan,
} from "../diagnostics/index.js";

type Position = { index: number; line: number; column: number };

type SpanContext = {
  start: Position;
  end: Position;
  lineText?: string;
};

type Colorizer = {
  severityLabel: (severity: DiagnosticSeverity) => string;
  pointer: (severity: DiagnosticSeverity, text: string) => string;
  accent: (text: string) => string;
  muted: (text: string) => string;
};

export type SourceReader = (file: string) => string | undefined;

const readSourceFile: SourceReader = (file) => {
  try {
    return readFileSync(file, "utf8");
  } catch {
    return undefined;
  }
};

const lineStartsOf = (source: string): number[] => {
  const starts = [0];
  for (let i = 0; i < source.length; i += 1) {
    if (source[i] === "\n") {
      starts.push(i + 1);
    }
  }
  return starts;
};

const positionAt = (starts: readonly number[], index: number): Position => {
  let line = 0;
  starts.forEach((start, candidate) => {
    if (start <= index) line = candidate;
  });
  const lineStart = starts[line] ?? 0;
  return { index, line: line + 1, column: index - lineStart };
};

const spanContext = (
  span: SourceSpan,
  readSource: SourceReader,
): SpanContext | undefined => {
  const source = readSource(span.file);
  if (source === undefined) return undefined;

  const starts = lineStartsOf(source);
  const startIndex = Math.min(Math.max(span.start, 0), source.length);
  const endIndex = Math.min(Math.max(span.end, startIndex), source.length);
  const start = positionAt(starts, startIndex);
  return {
    start,
    end: positionAt(starts, endIndex),
    lineText: source.split("\n")[start.line - 1],
  };
};

const ANSI = {
  red: 31,
  yellow: 33,
  magenta: 35,
  cyan: 36,
} as const;

const paint = (code: number, text: string) => `\u001B[${code}m${text}\u001B[0m`;

const severityColor = (severity: DiagnosticSeverity): number => {
  switch (severity) {
    case "warning":
      return ANSI.yellow;
    case "note":
      return ANSI.cyan;
    case "error":
      return ANSI.red;
  }
};

const createColorizer = (enabled: boolean): Colorizer => {
  if (!enabled) {
    const identity = (text: string) => text;
    return {
      severityLabel: (severity) => severity.toUpperCase(),
      pointer: (_severity, text) => text,
      accent: identity,
      muted: identity,
    };
  }

  return {
    severityLabel: (severity) =>
      paint(1, paint(severityColor(severity), severity.toUpperCase())),
    pointer: (severity, text) => paint(severityColor(severity), text),
    accent: (text) => paint(ANSI.magenta, text),
    muted: (text) => paint(2, text),
  };
};

const formatSnippet = ({
  diagnostic,
  context,
  color,
}: {
  diagnostic: Diagnostic;
  context: SpanContext;
  color: Colorizer;
}): string | undefined => {
  const { lineText, start, end } = context;
  if (lineText === undefined) return undefined;

  // Multi-line spans are underlined to the end of their first line.
  const lastColumn = end.line === start.line ? end.column : lineText.length;
  const width = Math.max(1, lastColumn - start.column);
  const gutter = `${start.line}`;
  const padding = " ".repeat(gutter.length);
  const marker = `${" ".repeat(start.column)}${color.pointer(
    diagnostic.severity,
    "^".repeat(width),
  )}`;

  return [
    `${padding} |`,
    `${gutter} | ${lineText}`,
    `${padding} | ${marker} ${color.muted(diagnostic.message)}`,
  ].join("\n");
};

const formatLocation = (span: SourceSpan, context?: SpanContext): string =>
  context
    ? `${span.file}:${context.start.line}:${context.start.column + 1}`
    : `${span.file}:${span.start}-${span.end}`;

const formatOne = ({
  diagnostic,
  color,
  readSource,
}: {
  diagnostic: Diagnostic;
  color: Colorizer;
  readSource: SourceReader;
}): string[] => {
  const context = spanContext(diagnostic.span, readSource);
  const phase = diagnostic.phase ? ` [${diagnostic.phase}]` : "";
  const header = `${formatLocation(diagnostic.span, context)} ${color.severityLabel(
    diagnostic.severity,
  )}${phase} ${color.accent(diagnostic.code)}: ${diagnostic.message}`;
  const snippet = context ? formatSnippet({ diagnostic, context, color }) : undefined;
  return snippet ? [header, snippet] : [header];
};

/**
 * Renders a diagnostic with its source line, followed by its related notes,
 * candidates and hints.
 */
export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  options: { color?: boolean; readSource?: SourceReader } = {},
): string => {
  const color = createColorizer(options.color ?? true);
  const readSource = options.readSource ?? readSourceFile;

  const lines = formatOne({ diagnostic, color, readSource });
  diagnostic.related?.forEach((note) => {
    lines.push(...formatOne({ diagnostic: note, color, readSource }));
  });
  diagnostic.candidates?.forEach((candidate) => {
    lines.push(`  = candidate: ${candidate.kind} ${candidate.path}`);
  });
  diagnostic.hints?.forEach((hint) => {
    lines.push(`  = help: ${hint.message}`);
  });
  return lines.join("\n");
};
