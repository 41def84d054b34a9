/**
 * Read all of a stream as UTF-8 text.
 */
export async function readStream(
  stream: NodeJS.ReadableStream = process.stdin
): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === "string" ? Buffer.from(chunk, "utf8") : chunk);
  }
  // Decode once so characters split across chunks survive
  return Buffer.concat(chunks).toString("utf8");
}

/** Drop a single trailing line break, as left by `echo` or a heredoc. */
export function stripTrailingNewline(text: string): string {
  if (text.endsWith("\r\n")) {
    return text.slice(0, -2);
  }
  return text.endsWith("\n") ? text.slice(0, -1) : text;
}
