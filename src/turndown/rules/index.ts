/**
 * Custom Turndown Rules Index
 */

export { unwrapLinkedImages } from "./unwrap-linked-images";
export { imageAltText } from "./image-alt-text";
