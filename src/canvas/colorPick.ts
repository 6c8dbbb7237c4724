import type { Vector2 } from '../model/vector2';
import type { RGB } from '../utils/color';
import { formatHexColor, rgbToInt } from '../utils/color';

/** Pixels of one table image */
export interface PixelSource {
  table: string;
  read: (at: Vector2) => RGB;
}

/**
 * `#RRGGBB` at a table pixel, or null when the loaded image belongs to
 * another table (or none has loaded yet) and the pick must stay pending.
 */
export function sampleTableColor(source: PixelSource | null, table: string, at: Vector2): string | null {
  if (!source || source.table !== table) return null;
  return formatHexColor(rgbToInt(source.read(at)));
}
