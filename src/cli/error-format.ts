/**
 * Terminal rendering for errors that escape a stratum command.
 * Color is only used when the target stream is a TTY.
 */

import {
  createAnsiFormatter,
  formatErrorLines,
  resolveColorEnabled,
  type AnsiFormatter,
  type AnsiStyle,
  type ErrorFormatLine,
  type ErrorFormatLineKind,
} from "../core/error-format.js";

export type CliErrorFormatOptions = {
  debug?: boolean;
  useColor?: boolean;
  stream?: { isTTY?: boolean };
};

type LabelStyle = { label: string; labelStyles: AnsiStyle[]; textStyles: AnsiStyle[] };

const LABELS: Partial<Record<ErrorFormatLineKind, LabelStyle>> = {
  title: { label: "Error:", labelStyles: ["red", "bold"], textStyles: ["bold"] },
  hint: { label: "Hint:", labelStyles: ["yellow"], textStyles: [] },
  next: { label: "Next:", labelStyles: ["cyan"], textStyles: [] },
  code: { label: "Code:", labelStyles: ["dim"], textStyles: ["dim"] },
  name: { label: "Name:", labelStyles: ["dim"], textStyles: ["dim"] },
  cause: { label: "Cause:", labelStyles: ["dim"], textStyles: ["dim"] },
};

export function renderCliError(error: unknown, options: CliErrorFormatOptions = {}): string {
  const format = createAnsiFormatter(
    resolveColorEnabled({ stream: options.stream ?? process.stderr, useColor: options.useColor }),
  );
  const lines = formatErrorLines(error, { mode: options.debug ? "debug" : "short" });
  return lines.map((line) => renderLine(line, format)).join("\n");
}

function renderLine(line: ErrorFormatLine, format: AnsiFormatter): string {
  if (line.kind === "stack") {
    const indented = line.text
      .split("\n")
      .map((frame) => `  ${frame}`)
      .join("\n");
    return `${format("Stack:", ["dim"])}\n${format(indented, ["dim"])}`;
  }

  const style = LABELS[line.kind];
  if (!style) return line.text;

  const text = style.textStyles.length > 0 ? format(line.text, style.textStyles) : line.text;
  return `${format(style.label, style.labelStyles)} ${text}`;
}
