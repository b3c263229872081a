/**
 * Check if a URL or path points to an image file
 * Query strings and fragments are ignored
 *
 * @example
 * isImageUrl("figures/plot.png?v=2") // true
 * isImageUrl("report.pdf") // false
 */
export function isImageUrl(url: string): boolean {
  const path = url.split(/[?#]/, 1)[0] ?? "";
  return /\.(jpe?g|png|gif|webp|bmp|tiff?|svg)$/i.test(path);
}
