/**
 * Percent-encode image paths in generated markdown
 *
 * Engines reference extracted figures by file name, and those names may carry
 * spaces, parentheses or non-ASCII characters that break link resolution.
 * Only lines holding an `![Image](...)` reference to a raster image are
 * touched; every other line passes through byte for byte.
 *
 * @example
 * encodeImagePaths("![Image](plot 1.png)") // "![Image](plot%201.png)"
 * encodeImagePaths("![Image](fig/a-b_c.png)") // unchanged
 */

export const IMAGE_MARKER = "![Image](";

const IMAGE_PATH_END = /\.(?:png|jpe?g|gif|webp|bmp|tiff?)\)\s*$/i;
const SAFE_CHAR = /^[A-Za-z0-9/.:_~-]$/;
const ESCAPE = /^%[0-9A-Fa-f]{2}/;
const REPLACEMENT_CHAR = "%EF%BF%BD";

export function encodeImagePaths(markdown: string): string {
  return markdown.split("\n").map(encodeLine).join("\n");
}

function encodeLine(line: string): string {
  const markerIndex = line.indexOf(IMAGE_MARKER);
  if (markerIndex === -1) {
    return line;
  }

  const end = IMAGE_PATH_END.exec(line);
  if (!end) {
    return line;
  }

  const start = markerIndex + IMAGE_MARKER.length;
  const stop = end.index + end[0].indexOf(")");
  if (start >= stop) {
    return line;
  }

  return line.slice(0, start) + encodeImagePath(line.slice(start, stop)) + line.slice(stop);
}

/**
 * Percent-encode one link target with the same rules, keeping `/`
 */
export function encodeImagePath(path: string): string {
  let encoded = "";
  let rest = path;

  while (rest.length > 0) {
    // Existing escapes are kept, so encoding twice is a no-op
    const escape = ESCAPE.exec(rest);
    if (escape) {
      encoded += escape[0];
      rest = rest.slice(escape[0].length);
      continue;
    }

    const codePoint = rest.codePointAt(0) ?? 0;
    const char = String.fromCodePoint(codePoint);
    encoded += encodeChar(char);
    rest = rest.slice(char.length);
  }

  return encoded;
}

function encodeChar(char: string): string {
  if (SAFE_CHAR.test(char)) {
    return char;
  }

  try {
    return encodeURIComponent(char).replace(
      /[!'()*]/g,
      (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
    );
  } catch {
    // Lone surrogate: no UTF-8 form exists
    return REPLACEMENT_CHAR;
  }
}
