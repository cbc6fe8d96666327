import type { CliRuntimeOptions } from "./types";

function normalizeList(values: readonly string[]): string[] {
  return values
    .flatMap((value) => value.split(","))
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

export function cloneCliRuntimeOptions(
  options: CliRuntimeOptions,
): CliRuntimeOptions {
  const { images, ...rest } = options;
  return images ? { ...rest, images: normalizeList(images) } : { ...rest };
}

/**
 * Layers `overrides` on top of `base`. Fields that are undefined in the
 * overrides keep the base value; lists are replaced, not merged.
 */
export function mergeCliRuntimeOptions(
  base: CliRuntimeOptions,
  overrides: CliRuntimeOptions,
): CliRuntimeOptions {
  const merged = cloneCliRuntimeOptions(base);
  const source = cloneCliRuntimeOptions(overrides);

  const defined = Object.fromEntries(
    Object.entries(source).filter(([, value]) => typeof value !== "undefined"),
  );

  return { ...merged, ...defined };
}
