import { readFile } from "node:fs/promises";
// NOTE: Node built-in modules are imported with the explicit `node:` prefix to guarantee ESM resolution in Node.js.

/** Splits a dictionary file into its words, preserving the order they were read in. */
export function parseDictionary(contents: string): string[] {
  return contents.split(/\s+/).filter((word) => word.length > 0);
}

/**
 * Groups words by length, keeping the read order inside every group. When
 * `lengths` is provided, words of any other length are dropped so that no
 * graph is ever allocated for a length nobody queries.
 */
export function groupWordsByLength(
  words: Iterable<string>,
  lengths?: ReadonlySet<number>,
): Map<number, string[]> {
  const groups = new Map<number, string[]>();
  for (const word of words) {
    if (lengths && !lengths.has(word.length)) {
      continue;
    }
    const group = groups.get(word.length);
    if (group) {
      group.push(word);
    } else {
      groups.set(word.length, [word]);
    }
  }
  return groups;
}

export async function loadDictionary(path: string): Promise<string[]> {
  return parseDictionary(await readFile(path, "utf8"));
}
