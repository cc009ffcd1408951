import type { ConversationSummary, StoreStats } from "../types.js";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local HH:MM:SS, or the raw string when it is not a date. */
export function formatTime(iso: string): string {
  const d = new Date(iso);
  if (Number.isNaN(d.getTime())) return iso;
  return `${pad(d.getHours())}:${pad(d.getMinutes())}:${pad(d.getSeconds())}`;
}

/** Local YYYY-MM-DD HH:MM, or the raw string when it is not a date. */
export function formatDateTime(iso: string): string {
  const d = new Date(iso);
  if (Number.isNaN(d.getTime())) return iso;
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())} ${pad(d.getHours())}:${pad(d.getMinutes())}`;
}

/**
 * Greedy word wrap. Existing line breaks are kept; words longer than the
 * width get a line of their own.
 */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  for (const paragraph of text.split("\n")) {
    if (paragraph.length <= width) {
      lines.push(paragraph);
      continue;
    }

    let current = "";
    for (const word of paragraph.split(/\s+/).filter(Boolean)) {
      if (!current) {
        current = word;
      } else if (current.length + 1 + word.length <= width) {
        current += " " + word;
      } else {
        lines.push(current);
        current = word;
      }
    }
    if (current) lines.push(current);
  }
  return lines;
}

export function describeSummary(summary: ConversationSummary): string {
  return `${summary.title} (${summary.message_count} messages, updated: ${formatDateTime(summary.updated_at)})`;
}

/** "total_conversations" → "Total Conversations" */
export function formatStatKey(key: string): string {
  return key
    .split("_")
    .map((part) => (part ? part[0].toUpperCase() + part.slice(1) : part))
    .join(" ");
}

/**
 * Human-readable lines for a stats record, with the soft-expiry caveat
 * when the backend has one.
 */
export function describeStats(stats: StoreStats): string[] {
  const lines = Object.entries(stats).map(([key, value]) => `${formatStatKey(key)}: ${String(value)}`);
  if (stats.backend === "redis" && typeof stats.key_ttl_days === "number") {
    lines.push(
      `Note: conversations not updated for ${stats.key_ttl_days} days expire from Redis automatically, even without cleanup.`
    );
  }
  return lines;
}
