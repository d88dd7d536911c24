export function statesChanged(
  before: readonly string[],
  after: readonly string[],
): boolean {
  const beforeSet = new Set(before);
  const afterSet = new Set(after);
  if (beforeSet.size !== afterSet.size) return true;
  for (const state of afterSet) {
    if (!beforeSet.has(state)) return true;
  }
  return false;
}

/** States present after the event that were not active before it. */
export function newlyActiveStates(
  before: readonly string[],
  after: readonly string[],
): string[] {
  const beforeSet = new Set(before);
  return [...new Set(after)].filter((state) => !beforeSet.has(state));
}
