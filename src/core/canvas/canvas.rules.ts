export const CANVAS_WIDTH = 32;
export const CANVAS_HEIGHT = 32;
export const CANVAS_PIXEL_COUNT = CANVAS_WIDTH * CANVAS_HEIGHT;
export const PALETTE_SIZE = 16;
export const PROOFS_PER_PAINT = 10;

export function isOnCanvas(x: number, y: number): boolean {
  return (
    Number.isInteger(x) &&
    Number.isInteger(y) &&
    x >= 0 &&
    x < CANVAS_WIDTH &&
    y >= 0 &&
    y < CANVAS_HEIGHT
  );
}

export function isPaletteColor(color: number): boolean {
  return Number.isInteger(color) && color >= 0 && color < PALETTE_SIZE;
}

// Row-major: all of row y=0 first, then y=1, ...
export function pixelIndex(x: number, y: number): number {
  return y * CANVAS_WIDTH + x;
}

// Awarded per batch of newly seen proofs; a remainder does not carry over.
export function paintAwardFor(newProofCount: number): number {
  if (!Number.isFinite(newProofCount) || newProofCount <= 0) {
    return 0;
  }
  return Math.floor(newProofCount / PROOFS_PER_PAINT);
}
