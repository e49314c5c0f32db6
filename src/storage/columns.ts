import type { CellValue } from "./types";

/** Trim, lower-case, spaces and hyphens to underscores. Idempotent. */
export function sanitizeKey(key: string): string {
  return key.trim().toLowerCase().replace(/ /g, "_").replace(/-/g, "_");
}

/** `ai_fit_score` → `Ai Fit Score` */
export function keyToLabel(key: string): string {
  return key
    .replace(/-/g, "_")
    .split("_")
    .filter((word) => word.length > 0)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(" ");
}

/** `Ai Fit Score` → `ai_fit_score` */
export function labelToKey(label: string): string {
  return label.toLowerCase().replace(/ /g, "_");
}

export function toCell(value: CellValue): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

/**
 * Merges metadata then enrichment under sanitized keys. Later payloads win on
 * collisions; keys that sanitize to nothing are dropped.
 */
export function mergeDynamicFields(
  ...payloads: Array<Record<string, CellValue> | null | undefined>
): Map<string, string> {
  const merged = new Map<string, string>();
  for (const payload of payloads) {
    if (!payload) continue;
    for (const [rawKey, value] of Object.entries(payload)) {
      const key = sanitizeKey(rawKey);
      if (!key) continue;
      merged.set(key, toCell(value));
    }
  }
  return merged;
}
