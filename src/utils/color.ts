// ── Colour helpers shared by the renderer, property panel and colour picker ──

export interface RGB {
  r: number;
  g: number;
  b: number;
}

export function intToRgb(color: number): RGB {
  return { r: (color >> 16) & 0xff, g: (color >> 8) & 0xff, b: color & 0xff };
}

export function rgbToInt({ r, g, b }: RGB): number {
  return (r << 16) | (g << 8) | b;
}

/** "#RRGGBB", upper case */
export function formatHexColor(color: number): string {
  return `#${color.toString(16).toUpperCase().padStart(6, '0')}`;
}

/** "#rrggbb" → 0xRRGGBB; null for anything else */
export function parseHexColor(text: string): number | null {
  const m = /^#?([0-9a-f]{6})$/i.exec(text.trim());
  return m ? parseInt(m[1], 16) : null;
}

export function rgba(color: number, alpha: number): string {
  const { r, g, b } = intToRgb(color);
  return `rgba(${r}, ${g}, ${b}, ${alpha})`;
}
