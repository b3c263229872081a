// Alt text used when an image has none; the path encoder keys on it
export const DEFAULT_ALT = "Image";

export function isImage(node: Node): node is HTMLImageElement {
  return node.nodeName === "IMG";
}

/**
 * Render an image, pointing at its local copy when one was made
 */
export function renderImage(
  img: HTMLImageElement,
  imageMapping: Map<string, string>,
): string {
  const originalSrc = img.getAttribute("src") ?? "";
  const src = imageMapping.get(originalSrc) ?? originalSrc;
  const alt = (img.getAttribute("alt") ?? "").trim() || DEFAULT_ALT;
  return `![${alt}](${src})`;
}

