/**
 * Shared test fixtures for the logscope integration suites.
 */

import { fileURLToPath } from "node:url";

export const SAMPLE_LOG_PATH = fileURLToPath(new URL("../fixtures/sample_app.log", import.meta.url));
export const SAMPLE_JSON_PATH = fileURLToPath(new URL("../fixtures/sample_app.json", import.meta.url));

/** Text lines for one ERROR per timestamp, all with the same message. */
export function errorLines(
  timestamps: string[],
  message = "Payment failed",
  service = "payment",
  host = "host1",
): string {
  return timestamps.map((ts) => `${ts} ERROR ${service} ${host} ${message}`).join("\n");
}
