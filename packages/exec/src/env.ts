/**
 * Merges environment overlays left to right; later layers win.
 * Undefined values are skipped so optional settings can be passed inline.
 */
export function mergeEnv(
  ...overlays: Array<Record<string, string | undefined> | undefined>
): Record<string, string> {
  const merged: Record<string, string> = {};
  for (const overlay of overlays) {
    if (!overlay) continue;
    for (const [key, value] of Object.entries(overlay)) {
      if (value === undefined) continue;
      merged[key] = value;
    }
  }
  return merged;
}
