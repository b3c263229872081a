/**
 * Turndown Rule: Image Alt Text
 *
 * Overrides the default image rule so every image gets alt text and
 * points at its local asset copy when one exists.
 */

import type TurndownService from "turndown";
import { isImage, renderImage } from "./image";

export function imageAltText(imageMapping: Map<string, string>) {
  return (service: TurndownService): void => {
    service.addRule("imageAltText", {
      filter: "img",
      replacement: (_content, node) =>
        isImage(node) ? renderImage(node, imageMapping) : "",
    });
  };
}
