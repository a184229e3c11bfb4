/** One JSON document per line, each terminated by "\n". Non-ASCII stays unescaped. */
export function formatJsonl(records: readonly unknown[]): string {
  return records.map((record) => JSON.stringify(record) + "\n").join("");
}
