/**
 * renderer.ts: Pure-function 2D rendering for the EditorCanvas component.
 * All draw* functions receive (ctx, state, camera, viewport) and only touch the context.
 */

import type { Camera } from './camera2d';
import { worldToScreen } from './coordinates';
import { elementHitBox } from './interaction';
import type { TableElement } from '../model/elements';
import type { Vector2 } from '../model/vector2';
import { add, sub } from '../model/vector2';
import { rgba } from '../utils/color';

/** Outlines are only worth drawing once icons are larger than 1:1 */
const OUTLINE_MIN_ZOOM = 1.01;
const ONE: Vector2 = { x: 1, y: 1 };

// ── Screen-space rectangle helpers ──

function screenRect(
  tl: Vector2, br: Vector2,
  camera: Camera, viewport: Vector2,
): { x: number; y: number; w: number; h: number } {
  const a = worldToScreen(tl, camera, viewport);
  const b = worldToScreen(br, camera, viewport);
  return { x: a.x, y: a.y, w: b.x - a.x, h: b.y - a.y };
}

function strokeWorldRect(
  ctx: CanvasRenderingContext2D,
  tl: Vector2, br: Vector2,
  style: string, lineWidth: number,
  camera: Camera, viewport: Vector2,
): void {
  const r = screenRect(tl, br, camera, viewport);
  ctx.strokeStyle = style;
  ctx.lineWidth = lineWidth;
  ctx.strokeRect(r.x, r.y, r.w, r.h);
}

// ── Background ──

export function clearViewport(ctx: CanvasRenderingContext2D, viewport: Vector2): void {
  ctx.fillStyle = '#000000';
  ctx.fillRect(0, 0, viewport.x, viewport.y);
}

// ── Table image ──

export function drawTableImage(
  ctx: CanvasRenderingContext2D,
  img: CanvasImageSource,
  size: Vector2,
  camera: Camera,
  viewport: Vector2,
): void {
  const r = screenRect({ x: 0, y: 0 }, size, camera, viewport);
  ctx.imageSmoothingEnabled = false;
  ctx.drawImage(img, r.x, r.y, r.w, r.h);
}

// ── Element boxes ──

export function drawElementOutlines(
  ctx: CanvasRenderingContext2D,
  elements: readonly TableElement[],
  hoveredId: string | null,
  camera: Camera,
  viewport: Vector2,
): void {
  if (camera.zoom <= OUTLINE_MIN_ZOOM) return;
  for (const el of elements) {
    if (el.id === hoveredId) continue;
    const [tl, br] = elementHitBox(el);
    strokeWorldRect(ctx, tl, br, 'rgba(0, 0, 0, 0.1)', camera.zoom, camera, viewport);
    strokeWorldRect(ctx, tl, br, 'rgba(255, 255, 255, 0.1)', camera.zoom, camera, viewport);
    strokeWorldRect(ctx, tl, br, rgba(el.embedColor, 0.6), camera.zoom, camera, viewport);
  }
}

export function drawHoverHighlight(
  ctx: CanvasRenderingContext2D,
  el: TableElement,
  camera: Camera,
  viewport: Vector2,
): void {
  const [tl, br] = elementHitBox(el);
  const r = screenRect(sub(tl, ONE), add(br, ONE), camera, viewport);
  ctx.fillStyle = 'rgba(255, 255, 255, 0.2)';
  ctx.fillRect(r.x, r.y, r.w, r.h);
  ctx.strokeStyle = rgba(el.embedColor, 1);
  ctx.lineWidth = camera.zoom;
  ctx.strokeRect(r.x, r.y, r.w, r.h);
}

// ── Crosshair cursor (screen space), shown while a colour pick is pending ──

export function drawCrosshair(ctx: CanvasRenderingContext2D, screen: Vector2): void {
  const len = 12;
  ctx.strokeStyle = '#ffffff';
  ctx.lineWidth = 1;
  ctx.globalAlpha = 0.8;
  ctx.beginPath();
  ctx.moveTo(screen.x - len, screen.y);
  ctx.lineTo(screen.x + len, screen.y);
  ctx.moveTo(screen.x, screen.y - len);
  ctx.lineTo(screen.x, screen.y + len);
  ctx.stroke();
  ctx.globalAlpha = 1.0;
}
