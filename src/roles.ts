import { loadJsonFile } from "./config";
import { ConfigurationError } from "./errors";

/** Reads `{ roles: string[] }`; blanks and repeats are dropped. */
export function loadRoles(filepath: string): string[] {
  const data = loadJsonFile(filepath);
  const raw =
    typeof data === "object" && data !== null && "roles" in data
      ? data.roles
      : undefined;

  if (!Array.isArray(raw)) {
    throw new ConfigurationError(`${filepath} must contain a "roles" array`);
  }

  const roles: string[] = [];
  for (const entry of raw) {
    if (typeof entry !== "string") continue;
    const role = entry.trim();
    if (role && !roles.includes(role)) roles.push(role);
  }
  return roles;
}
