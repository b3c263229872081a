/**
 * Whether a plain-text serialization carries no content
 * Some engines emit a lone "---" for documents they could not read
 */
export function isBlankText(text: string): boolean {
  const trimmed = text.trim();
  return trimmed === "" || trimmed === "---";
}
