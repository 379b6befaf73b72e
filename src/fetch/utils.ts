import type { HeaderEntries, HeaderField } from '../types/request.js';

/**
 * Flattens header field lists into `[name, value]` entries for `fetch`.
 * Lists are concatenated in argument order; entries keep their order and duplicated names are not merged.
 */
export function toHeaderEntries(...groups: ReadonlyArray<readonly HeaderField[] | undefined>): HeaderEntries {
  const entries: HeaderEntries = [];
  for (const fields of groups) {
    for (const { name, value } of fields ?? []) {
      entries.push([name, value]);
    }
  }

  return entries;
}
