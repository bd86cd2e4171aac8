/**
 * Code-point string comparison; unlike localeCompare it gives the same
 * order on every machine
 */
export function compareText(left: string, right: string): number {
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

export function sortBy<T>(items: readonly T[], keyOf: (item: T) => string): T[] {
  return [...items].sort((left, right) => compareText(keyOf(left), keyOf(right)));
}
