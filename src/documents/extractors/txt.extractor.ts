const utf8 = new TextDecoder("utf-8", { fatal: true });

/** Throws on bytes that are not valid UTF-8. Line endings come back as "\n". */
export function extractTxtText(buffer: Buffer): string {
  return utf8.decode(buffer).replace(/\r\n?/g, "\n");
}
