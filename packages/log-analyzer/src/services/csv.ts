const NEEDS_QUOTING_REGEX = /[",\r\n]/;

function escapeField(value: string): string {
  return NEEDS_QUOTING_REGEX.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

/** Render rows as CSV, one `\n`-terminated line per row. */
export function toCsv(rows: readonly (readonly string[])[]): string {
  return rows.map((row) => `${row.map(escapeField).join(",")}\n`).join("");
}
