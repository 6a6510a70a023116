/**
 * Output rendering helpers
 */

import { formatFieldValue, type DocumentOperation, type MetricsCollector } from "@docfeed/sdk";

type Color = "red" | "green" | "yellow";

/**
 * Apply ANSI color when enabled (stream is a TTY)
 */
export function colorize(text: string, color: Color, enabled: boolean): string {
  if (!enabled) {
    return text;
  }

  const codes: Record<Color, string> = {
    red: "\x1b[31m",
    green: "\x1b[32m",
    yellow: "\x1b[33m",
  };

  const reset = "\x1b[0m";
  return `${codes[color]}${text}${reset}`;
}

/**
 * One-line summary of an operation
 * @example "put id:shop:article::1 title=\"Hello\" views=3"
 * @example "update id:shop:article::1 views:arithmetic (create)"
 */
export function summarizeOperation(operation: DocumentOperation): string {
  const head = `${operation.kind} ${operation.id.toString()}`;
  const parts: string[] = [];

  switch (operation.kind) {
    case "put":
      for (const [name, value] of operation.fields) {
        parts.push(`${name}=${truncate(formatFieldValue(value))}`);
      }
      break;
    case "update":
      for (const update of operation.fieldUpdates) {
        parts.push(`${update.field}:${update.updates.map((u) => u.kind).join(",")}`);
      }
      if (operation.createIfNonExistent) {
        parts.push("(create)");
      }
      break;
    case "remove":
      break;
  }

  if (operation.condition !== undefined) {
    parts.push(`if ${JSON.stringify(operation.condition)}`);
  }

  return parts.length > 0 ? `${head} ${parts.join(" ")}` : head;
}

/**
 * Per-kind operation counts
 */
export function formatCounts(operations: readonly DocumentOperation[]): string[] {
  const counts = { put: 0, update: 0, remove: 0 };
  for (const op of operations) {
    counts[op.kind]++;
  }
  return [
    `put: ${counts.put}`,
    `update: ${counts.update}`,
    `remove: ${counts.remove}`,
    `total: ${operations.length}`,
  ];
}

/**
 * Per-document-type statistics, sorted by type name
 */
export function formatTypeStats(metrics: MetricsCollector): string[] {
  const lines: string[] = [];
  const entries = Array.from(metrics.getAllMetrics()).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));

  for (const [type, m] of entries) {
    const operations = m.puts + m.updates + m.removes;
    const p95 = metrics.getP95(m.decodeTimeMs).toFixed(2);
    lines.push(
      `${type}: ${operations} operations (${m.puts} put, ${m.updates} update, ${m.removes} remove), ` +
        `${m.fields} fields, p95 ${p95}ms`
    );
    const errors = Object.entries(m.errors);
    if (errors.length > 0) {
      lines.push(`  errors: ${errors.map(([code, n]) => `${code}=${n}`).join(", ")}`);
    }
  }

  return lines;
}

function truncate(text: string, max = 80): string {
  return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}
