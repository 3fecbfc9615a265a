import { readFileSync } from "node:fs";
import { isAbsolute, resolve } from "node:path";
import type {
  Diagnostic,
  DiagnosticSeverity,
  SourceSpan,
} from "@qcheck/compiler";

type Style = DiagnosticSeverity | "bold" | "dim" | "code";

const ANSI_CODES: Record<Style, string> = {
  error: "31",
  warning: "33",
  note: "36",
  bold: "1",
  dim: "2",
  code: "35",
};

type Paint = (style: Style, text: string) => string;

const createPaint = (enabled: boolean): Paint =>
  enabled
    ? (style, text) => `\u001B[${ANSI_CODES[style]}m${text}\u001B[0m`
    : (_style, text) => text;

/** Where a span lands in its unit file; `position` is 1-based. */
type SpanLocation = {
  path: string;
  span: SourceSpan;
  position?: { line: number; column: number; text: string };
};

const locate = (span: SourceSpan): SpanLocation => {
  const path = isAbsolute(span.file) ? span.file : resolve(span.file);
  let source: string;
  try {
    source = readFileSync(path, "utf8");
  } catch {
    // Units built in memory carry spans for files that are not on disk.
    return { path, span };
  }

  const start = Math.min(Math.max(span.start, 0), source.length);
  const before = source.slice(0, start).split("\n");
  const line = before.length;
  const column = (before[line - 1] ?? "").length + 1;
  const text = source.split("\n")[line - 1] ?? "";
  return { path, span, position: { line, column, text } };
};

const describeLocation = ({ path, span, position }: SpanLocation): string =>
  position
    ? `${path}:${position.line}:${position.column}`
    : `${path}@${span.start}..${span.end}`;

const GUTTER = "   | ";

/** The span's source line without its indentation, underlined. */
const excerpt = (
  location: SpanLocation,
  severity: DiagnosticSeverity,
  paint: Paint
): string[] => {
  const { position, span } = location;
  if (!position) return [];
  const shown = position.text.trim();
  if (!shown) return [];

  const indent = position.text.length - position.text.trimStart().length;
  const offset = Math.min(Math.max(position.column - 1 - indent, 0), shown.length - 1);
  const width = Math.max(1, Math.min(span.end - span.start, shown.length - offset));
  return [
    `${GUTTER}${shown}`,
    `${GUTTER}${" ".repeat(offset)}${paint(severity, "^".repeat(width))}`,
  ];
};

const annotation = (label: string, text: string, paint: Paint): string =>
  `   ${paint("dim", `= ${label}:`)} ${text}`;

export const formatCliDiagnostic = (
  diagnostic: Diagnostic,
  options: { color?: boolean } = {}
): string => {
  const paint = createPaint(options.color ?? true);
  const location = locate(diagnostic.span);
  const phase = diagnostic.phase ? ` (${diagnostic.phase})` : "";

  const lines = [
    `${paint("bold", paint(diagnostic.severity, diagnostic.severity))}[${paint(
      "code",
      diagnostic.code
    )}] ${diagnostic.kind}: ${diagnostic.message}`,
    `  --> ${describeLocation(location)}${phase}`,
    ...excerpt(location, diagnostic.severity, paint),
  ];

  if (diagnostic.subjects.length > 0) {
    lines.push(annotation("subjects", diagnostic.subjects.join(", "), paint));
  }
  diagnostic.related?.forEach((related) => {
    lines.push(annotation(related.severity, related.message, paint));
    lines.push(`     --> ${describeLocation(locate(related.span))}`);
  });
  diagnostic.hints?.forEach((hint) => {
    lines.push(annotation("hint", hint.message, paint));
  });

  return lines.join("\n");
};
