import type { Rgb } from "./image";
import { ProcessingError } from "./processingError";

// #RRGGBB only: short (#RGB) and alpha (#RRGGBBAA) forms are rejected
const HEX_COLOR_REGEX = /^#[0-9a-f]{6}$/i;

/**
 * Parse a `#RRGGBB` colour (case-insensitive).
 * Throws ProcessingError("InvalidColor") for anything else.
 */
export function parseHexColor(value: string): Rgb {
  if (!HEX_COLOR_REGEX.test(value)) {
    throw new ProcessingError("InvalidColor");
  }

  return {
    r: Number.parseInt(value.slice(1, 3), 16),
    g: Number.parseInt(value.slice(3, 5), 16),
    b: Number.parseInt(value.slice(5, 7), 16),
  };
}
