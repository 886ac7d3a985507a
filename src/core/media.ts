import { ImageSize, Quality } from "./types.js";

// Approximate bytes per second per pixel for the platform's source renditions.
export const SIZE_FACTOR = 0.38848958333;

/** Picks the smallest picture for `low`, the largest otherwise. Sizes are ordered ascending. */
export function selectImage(sizes: readonly ImageSize[] | null | undefined, quality: Quality): string {
  if (!sizes || sizes.length === 0) return "";
  if (quality === "low") return sizes[0].link;
  return sizes[sizes.length - 1].link;
}

/** Very approximate file size; linear in duration. */
export function approximateSize(duration: number, width: number, height: number): number {
  return duration * Math.round(width * height * SIZE_FACTOR);
}
