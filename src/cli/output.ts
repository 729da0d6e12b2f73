/**
 * Output formatting for CLI commands. Amounts are bigint throughout, so
 * both JSON and tables render them as decimal strings.
 */

export type Cell = string | number | bigint;

export function formatJson(data: unknown): string {
  return JSON.stringify(
    data,
    (_key, value: unknown) => (typeof value === "bigint" ? value.toString() : value),
    2,
  );
}

/** Text cells are left-aligned, numbers and amounts right-aligned. */
export function formatTable(headers: string[], rows: Cell[][]): string {
  const cells = rows.map((row) => headers.map((_, i) => row[i] ?? ""));
  const widths = headers.map((h, i) =>
    Math.max(h.length, ...cells.map((row) => String(row[i]).length)),
  );
  const render = (cell: Cell, width: number) =>
    typeof cell === "string" ? cell.padEnd(width) : String(cell).padStart(width);

  const lines = [
    headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join(" | "),
    widths.map((w) => "-".repeat(w)).join("-+-"),
    ...cells.map((row) => row.map((cell, i) => render(cell, widths[i] ?? 0)).join(" | ")),
  ];
  return lines.map((line) => line.trimEnd()).join("\n");
}

export function output(data: unknown, json: boolean): void {
  console.log(json || typeof data !== "string" ? formatJson(data) : data);
}
