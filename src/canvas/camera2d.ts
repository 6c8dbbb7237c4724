/**
 * 2D Camera: viewport state and per-frame motion integration
 *
 * World coordinates: X right, Y down, unit = canvas pixels
 * `position` is the world point shown at the centre of the viewport.
 *
 * The camera moves in exactly one of two modes:
 *   inertial: velocity/acceleration with exponential damping (held keys)
 *   easing  : time-bounded ease-out between two points (navigation commands)
 */

import type { Vector2 } from '../model/vector2';
import { ZERO, add, sub, scale, divide } from '../model/vector2';

export type CameraMotion =
  | { kind: 'inertial'; velocity: Vector2; acceleration: Vector2 }
  | { kind: 'easing'; start: Vector2; target: Vector2; elapsed: number };

export interface Camera {
  position: Vector2;
  motion: CameraMotion;
  zoom: number;        // screen pixels per world pixel
  targetZoom: number;
  lastPosition: Vector2;
  lastDt: number;      // 0 until the first tick
}

/** Fraction of velocity left after one second of coasting */
export const CAMERA_DAMPING = 0.001;
/** Screen-space acceleration applied by a held direction key */
export const CAMERA_SPEED = 10000;
export const ZOOM_DECAY_BASE = 10000;
export const ZOOM_DECAY_RATE = 0.99;
/** Seconds */
export const EASING_DURATION = 1;
/** Zoom applied when switching tables */
export const TABLE_ZOOM = 4;
/** Longest step a single frame may take, e.g. after the tab was hidden */
export const MAX_FRAME_DT = 0.25;

export const INERTIAL_REST: CameraMotion = { kind: 'inertial', velocity: ZERO, acceleration: ZERO };

export function createCamera(position: Vector2 = ZERO): Camera {
  return {
    position,
    motion: INERTIAL_REST,
    zoom: 1,
    targetZoom: 1,
    lastPosition: position,
    lastDt: 0,
  };
}

/** 1 − 2^(−10t): fast start, settles on 1 */
export function easeOutExpo(progress: number): number {
  return 1 - 2 ** (-10 * progress);
}

/**
 * Advance the camera by `dt` seconds.
 * Order: zoom smoothing, history, then easing or inertial integration.
 */
export function tickCamera(camera: Camera, dt: number): Camera {
  const zoom = camera.zoom
    + (camera.targetZoom - camera.zoom) * (1 - ZOOM_DECAY_BASE ** (-ZOOM_DECAY_RATE * dt));
  const base = { ...camera, zoom, lastPosition: camera.position, lastDt: dt };
  const motion = camera.motion;

  if (motion.kind === 'easing') {
    if (motion.elapsed > EASING_DURATION) {
      return { ...base, position: motion.target, motion: INERTIAL_REST };
    }
    const t = easeOutExpo(motion.elapsed / EASING_DURATION);
    return {
      ...base,
      position: add(motion.start, scale(sub(motion.target, motion.start), t)),
      motion: { ...motion, elapsed: motion.elapsed + dt },
    };
  }

  const position = add(camera.position, scale(motion.velocity, dt));
  const accelerated = add(motion.velocity, scale(motion.acceleration, dt));
  const velocity = scale(accelerated, CAMERA_DAMPING ** dt);
  return { ...base, position, motion: { ...motion, velocity } };
}

/** Frame time as fed to `tickCamera`: never negative, capped at MAX_FRAME_DT */
export function clampFrameDt(dt: number): number {
  if (!Number.isFinite(dt) || dt <= 0) return 0;
  return Math.min(dt, MAX_FRAME_DT);
}

/** Start a new ease from the current position. Replaces any ease in flight. */
export function easeCameraTo(camera: Camera, target: Vector2): Camera {
  return {
    ...camera,
    motion: { kind: 'easing', start: camera.position, target, elapsed: 0 },
  };
}

/**
 * Drop an in-flight ease and coast with the velocity implied by the last frame.
 * Returns the same camera when it is not easing.
 */
export function releaseEasing(camera: Camera): Camera {
  if (camera.motion.kind !== 'easing') return camera;
  const velocity = camera.lastDt > 0
    ? divide(sub(camera.position, camera.lastPosition), camera.lastDt)
    : ZERO;
  return { ...camera, motion: { kind: 'inertial', velocity, acceleration: ZERO } };
}

/** Acceleration only applies while inertial; easing keeps it at zero. */
export function setAcceleration(camera: Camera, acceleration: Vector2): Camera {
  const motion = camera.motion;
  if (motion.kind !== 'inertial') return camera;
  if (motion.acceleration.x === acceleration.x && motion.acceleration.y === acceleration.y) return camera;
  return { ...camera, motion: { ...motion, acceleration } };
}

/** Zero the inertial velocity. An ease in flight is left alone. */
export function stopCamera(camera: Camera): Camera {
  const motion = camera.motion;
  if (motion.kind !== 'inertial') return camera;
  return { ...camera, motion: { ...motion, velocity: ZERO } };
}

/** Callers must pass zoom > 0; no clamping happens here. */
export function setTargetZoom(camera: Camera, targetZoom: number): Camera {
  return { ...camera, targetZoom };
}

/** Where navigation measures from: the ease target while easing, else the position */
export function cameraFocus(camera: Camera): Vector2 {
  return camera.motion.kind === 'easing' ? camera.motion.target : camera.position;
}

export function cameraVelocity(camera: Camera): Vector2 {
  return camera.motion.kind === 'inertial' ? camera.motion.velocity : ZERO;
}
