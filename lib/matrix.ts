import type { Logger } from "./log.js";

/// The cartesian product of the given dimensions, with the first dimension
/// varying slowest.
export const evalMatrix = <T extends Record<string, unknown>>(dimensions: {
  [K in keyof T]: ReadonlyArray<T[K]>;
}): Array<T> => {
  const evalNext = <K extends keyof T>(
    allVariants: Array<Partial<T>>,
    key: K,
    values: ReadonlyArray<T[K]>,
  ): Array<Partial<T>> =>
    allVariants.flatMap((variant) =>
      values.map((value): Partial<T> => ({ ...variant, [key]: value })),
    );
  const dimensionKeys = Object.keys(dimensions) as Array<keyof T>;
  const evaluated = dimensionKeys.reduce(
    (allVariants, dimensionKey) =>
      evalNext(allVariants, dimensionKey, dimensions[dimensionKey]),
    [{}] as Array<Partial<T>>,
  );
  return evaluated as Array<T>;
};

/// Keeps the first item for every key.
export const uniqueBy = <T, K>(items: ReadonlyArray<T>, key: (item: T) => K) => {
  const seen = new Set<K>();
  return items.filter((item) => {
    const itemKey = key(item);
    if (seen.has(itemKey)) {
      return false;
    }
    seen.add(itemKey);
    return true;
  });
};

export const logMatrix = (log: Logger, matrix: unknown) =>
  log.info(JSON.stringify(matrix, null, "  "));
