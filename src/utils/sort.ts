/** Orders by name using plain code-unit comparison, independent of locale. */
export function byName<T extends { name: string }>(a: T, b: T): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}
