import { isSafeWorldId } from "../backup/archive-naming.js";

export const WORLD_ID_SEPARATOR = "~";

export function worldIdFor(mode: string, name: string): string {
  return `${mode}${WORLD_ID_SEPARATOR}${name}`;
}

/** Inverse of `worldIdFor`; null unless both halves are usable directory names. */
export function splitWorldId(worldId: string): { mode: string; name: string } | null {
  const index = worldId.indexOf(WORLD_ID_SEPARATOR);
  if (index <= 0) return null;

  const mode = worldId.slice(0, index);
  const name = worldId.slice(index + WORLD_ID_SEPARATOR.length);
  return isSafeWorldId(mode) && isSafeWorldId(name) ? { mode, name } : null;
}
