/**
 * `count` names of the form `<prefix><n>`, n counting up from 0 and skipping
 * every name in `bound`.
 *
 * `bound` must be read from the engine for each invocation: the namespace is
 * shared and changes between calls.
 */
export function generateNames(bound: ReadonlySet<string>, prefix: string, count: number): string[] {
  const names: string[] = [];
  let seq = 0;
  while (names.length < count) {
    let candidate = prefix + seq;
    while (bound.has(candidate)) {
      seq++;
      candidate = prefix + seq;
    }
    seq++;
    names.push(candidate);
  }
  return names;
}
