/**
 * Number of positions at which two words of the same length differ.
 *
 * Counting stops once the result exceeds `limit`; the value returned is then
 * `limit + 1`, which is all a caller comparing against `limit` needs.
 */
export function hammingDistance(left: string, right: string, limit = Number.POSITIVE_INFINITY): number {
  if (left.length !== right.length) {
    throw new RangeError(`cannot compare '${left}' and '${right}': lengths differ`);
  }

  let differences = 0;
  for (let position = 0; position < left.length; position += 1) {
    if (left.charCodeAt(position) !== right.charCodeAt(position)) {
      differences += 1;
      if (differences > limit) {
        break;
      }
    }
  }
  return differences;
}
