/**
 * Decide which upstream model serves a request.
 * @packageDocumentation
 */

/** Prefixes of model names that are sent upstream unchanged. */
export const DEFAULT_PASSTHROUGH_PREFIXES = ['gpt-', 'o1-', 'ep-', 'doubao-', 'deepseek-'] as const;

/**
 * Requested names that already address an upstream model pass through;
 * anything else (typically a Messages API model name) gets the rotated model.
 */
export function resolveTargetModel(
  requested: string,
  rotated: string,
  passthroughPrefixes: readonly string[] = DEFAULT_PASSTHROUGH_PREFIXES,
): string {
  const name = requested.trim();
  if (name && passthroughPrefixes.some((prefix) => name.startsWith(prefix))) {
    return name;
  }
  return rotated;
}
