import type { CaseResult, RunReport, VerdictCode } from "./types.js";

const ANSI = {
  green: "\u001b[92m",
  yellow: "\u001b[93m",
  red: "\u001b[91m",
  bold: "\u001b[1m",
  reset: "\u001b[0m"
};

const VERDICT_COLORS: Record<VerdictCode, string> = {
  AC: ANSI.green,
  WA: ANSI.red,
  RTE: ANSI.red,
  TLE: ANSI.yellow
};

const HEADER = ["Serial No", "Input", "Expected Output", "Your Output", "Result"];

export interface RenderOptions {
  color: boolean;
}

export function stripAnsi(text: string): string {
  return text.replace(/\u001b\[[0-9;]*m/g, "");
}

function paint(text: string, color: string, options: RenderOptions): string {
  return options.color ? `${ANSI.bold}${color}${text}${ANSI.reset}` : text;
}

function cellLines(cell: string): string[] {
  return cell.replace(/\s+$/, "").split("\n");
}

/** Renders rows as a bordered table; multi-line cells grow their row. */
export function renderTable(rows: string[][]): string {
  const columns = Math.max(...rows.map((row) => row.length));
  const widths = Array.from({ length: columns }, (_, col) =>
    Math.max(...rows.flatMap((row) => cellLines(row[col] ?? "").map((line) => stripAnsi(line).length)))
  );

  const border = `+${widths.map((width) => "-".repeat(width + 2)).join("+")}+`;
  const renderRow = (row: string[]): string[] => {
    const cells = widths.map((_, col) => cellLines(row[col] ?? ""));
    const height = Math.max(...cells.map((lines) => lines.length));
    return Array.from({ length: height }, (_, lineIndex) => {
      const parts = cells.map((lines, col) => {
        const line = lines[lineIndex] ?? "";
        return `${line}${" ".repeat(widths[col] - stripAnsi(line).length)}`;
      });
      return `| ${parts.join(" | ")} |`;
    });
  };

  const [header, ...body] = rows;
  return [border, ...renderRow(header ?? []), border, ...body.flatMap(renderRow), border].join("\n");
}

function caseRow(result: CaseResult, options: RenderOptions): string[] {
  return [
    String(result.serial),
    result.input,
    result.expectedOutput,
    result.userOutput ?? "N/A",
    paint(result.verdict, VERDICT_COLORS[result.verdict], options)
  ];
}

export function renderReport(report: RunReport, options: RenderOptions = { color: false }): string {
  switch (report.kind) {
    case "compile_error": {
      const message = paint("Compilation error. Not run against test cases.", ANSI.red, options);
      const detail = report.stderr.trim();
      return detail ? `${message}\n${detail}` : message;
    }
    case "missing_cases":
      return `Test cases not found for problem ${report.problem}.`;
    case "completed": {
      if (report.cases.length === 0) {
        return `No sample cases stored for problem ${report.problem}.`;
      }
      const passed = report.cases.filter((result) => result.verdict === "AC").length;
      const table = renderTable([HEADER, ...report.cases.map((result) => caseRow(result, options))]);
      return `${table}\n${passed}/${report.cases.length} sample cases passed.`;
    }
  }
}
