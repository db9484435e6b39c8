/**
 * ExtAna RGB LED colour, each channel 0-255.
 */
export interface LedColor {
  r: number;
  g: number;
  b: number;
}

export function sameColor(a: LedColor | null, b: LedColor): boolean {
  return a !== null && a.r === b.r && a.g === b.g && a.b === b.b;
}
