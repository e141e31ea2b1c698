/** Serializes each item as one JSON line, keeping non-ASCII text as-is. */
export async function* toNdjson<T>(items: AsyncIterable<T>): AsyncGenerator<string> {
  for await (const item of items) {
    yield `${JSON.stringify(item)}\n`;
  }
}
