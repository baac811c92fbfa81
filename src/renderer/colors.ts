export interface RGB {
  r: number;
  g: number;
  b: number;
}

/** Parse `#rrggbb` (or `#rgb`) into 0–255 channels. */
export function parseHexColor(hex: string): RGB {
  const match = /^#([0-9a-f]{3}|[0-9a-f]{6})$/i.exec(hex);
  if (!match) {
    throw new Error(`Invalid hex colour: ${hex}`);
  }
  let digits = match[1];
  if (digits.length === 3) {
    digits = digits.split('').map((d) => d + d).join('');
  }
  return {
    r: parseInt(digits.slice(0, 2), 16),
    g: parseInt(digits.slice(2, 4), 16),
    b: parseInt(digits.slice(4, 6), 16),
  };
}
