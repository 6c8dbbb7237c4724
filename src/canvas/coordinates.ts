/**
 * Screen ↔ world transforms.
 *
 * Transform: screenPos = viewport / 2 − (camera.position − worldPos) × zoom
 */

import type { Camera } from './camera2d';
import type { Vector2 } from '../model/vector2';

/** World → Screen (CSS pixel) */
export function worldToScreen(world: Vector2, camera: Camera, viewport: Vector2): Vector2 {
  return {
    x: viewport.x / 2 - (camera.position.x - world.x) * camera.zoom,
    y: viewport.y / 2 - (camera.position.y - world.y) * camera.zoom,
  };
}

/** Screen (CSS pixel) → World */
export function screenToWorld(screen: Vector2, camera: Camera, viewport: Vector2): Vector2 {
  return {
    x: camera.position.x - (viewport.x / 2 - screen.x) / camera.zoom,
    y: camera.position.y - (viewport.y / 2 - screen.y) / camera.zoom,
  };
}

