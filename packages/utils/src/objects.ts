export function isEmptyObject(value: unknown): boolean {
  return typeof value === "object" && value !== null && Object.keys(value).length === 0;
}

export function mapValues<T, R>(obj: {[key: string]: T}, iteratee: (value: T, key: string) => R): {[key: string]: R} {
  const output: {[key: string]: R} = {};
  for (const [key, value] of Object.entries(obj)) {
    output[key] = iteratee(value, key);
  }
  return output;
}
