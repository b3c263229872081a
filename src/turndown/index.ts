/**
 * Turndown Configuration
 * Sets up Turndown for the in-process HTML backend
 */

import TurndownService from "turndown";
import { gfm } from "@truto/turndown-plugin-gfm";
import { imageAltText, unwrapLinkedImages } from "./rules";

/**
 * @param imageMapping - original `src` → asset path written next to the markdown
 */
export function createTurndownService(
  imageMapping: Map<string, string>,
): TurndownService {
  const turndownService = new TurndownService({
    headingStyle: "atx",
    codeBlockStyle: "fenced",
    bulletListMarker: "-",
    emDelimiter: "_",
    strongDelimiter: "**",
  });

  // Tables, strikethrough and task lists
  turndownService.use(gfm);

  turndownService.use(unwrapLinkedImages(imageMapping));
  turndownService.use(imageAltText(imageMapping));

  return turndownService;
}
