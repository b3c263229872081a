/**
 * Turndown Rule: Unwrap Images from Links
 *
 * Exported documents often wrap figures in <a> tags pointing at the full
 * size file. Keep the image, drop the link.
 */

import type TurndownService from "turndown";
import { isImage, renderImage } from "./image";

export function unwrapLinkedImages(imageMapping: Map<string, string>) {
  return (service: TurndownService): void => {
    service.addRule("unwrapLinkedImages", {
      filter: (node) =>
        node.nodeName === "A" &&
        Array.from(node.childNodes).filter(isImage).length === 1,
      replacement: (_content, node) => {
        const img = Array.from(node.childNodes).find(isImage);
        return img ? renderImage(img, imageMapping) : "";
      },
    });
  };
}
