export const metadataKeys = [
  "topic",
  "description",
  "author",
  "version",
  "required",
] as const;

export type MetadataKey = (typeof metadataKeys)[number];

export function isMetadataKey(key: string): key is MetadataKey {
  return metadataKeys.some((known) => known === key);
}

export const requiredMetadataKeys = [
  "topic",
  "description",
  "author",
  "version",
] as const;

export const varBlockScopes = new Map<string, "global" | "local">([
  ["$global_vars", "global"],
  ["$local_vars", "local"],
]);

export const NAME_PATTERN = /^[A-Za-z0-9_]+$/;

export const SCRIPT_EXTENSION = ".bdl";

export const DEFAULT_ENTRY_FILE = "main.bdl";

export const DEFAULT_START_NODE = "start";

export const ARROW = "->";

export const EXIT_TOKEN = "{exit}";

/** `${name}` or `${a.b}`; anything else between `${` and `}` stays as written. */
export const INTERPOLATION_PATTERN = /\$\{\s*([A-Za-z0-9_.]+)\s*\}/g;
