/**
 * Returns a copy of `headers` with `name` set to `value`, replacing any entry
 * whose name differs only in case.
 */
export const setHeader = (
  headers: Readonly<Record<string, string>> | undefined,
  name: string,
  value: string
): Record<string, string> => {
  const wanted = name.toLowerCase();
  const result: Record<string, string> = {};
  for (const [key, existing] of Object.entries(headers ?? {})) {
    if (key.toLowerCase() !== wanted) {
      result[key] = existing;
    }
  }
  result[name] = value;
  return result;
};

/**
 * Merges header sets left to right. Later names win, compared case-insensitively.
 */
export const mergeHeaders = (
  ...sets: readonly (Readonly<Record<string, string>> | undefined)[]
): Record<string, string> => {
  let result: Record<string, string> = {};
  for (const set of sets) {
    for (const [name, value] of Object.entries(set ?? {})) {
      result = setHeader(result, name, value);
    }
  }
  return result;
};
