const HEX_COLOR = /^#?([0-9a-f]{6})$/i;

function parseHex(hex: string): number {
  const match = HEX_COLOR.exec(hex);
  if (!match) {
    throw new Error(`Invalid color ${hex}, expected #RRGGBB`);
  }
  return parseInt(match[1], 16);
}

/** "#RRGGBB" -> 0xRRGGBB, the form Phaser's fill and stroke styles take. */
export function hexToColor(hex: string): number {
  return parseHex(hex);
}

/**
 * Blends a color toward black. alpha 0 keeps the color, 1 gives black.
 */
export function fadeColor(hex: string, alpha: number): string {
  const value = parseHex(hex);
  const a = Math.max(0, Math.min(1, alpha));

  const channel = (shift: number) => {
    const c = (value >> shift) & 0xff;
    return Math.trunc(c * (1 - a))
      .toString(16)
      .padStart(2, "0");
  };

  return `#${channel(16)}${channel(8)}${channel(0)}`;
}

/**
 * Fade amount for trail dot `index` of `count`, oldest first: the oldest dot is
 * the brightest and each later one is darker.
 */
export function trailFade(index: number, count: number): number {
  return index / (count + 1);
}
