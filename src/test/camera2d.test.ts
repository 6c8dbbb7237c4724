import { describe, it, expect } from 'vitest';
import {
  createCamera,
  tickCamera,
  easeCameraTo,
  releaseEasing,
  setAcceleration,
  setTargetZoom,
  stopCamera,
  cameraFocus,
  cameraVelocity,
  easeOutExpo,
  INERTIAL_REST,
  CAMERA_DAMPING,
  ZOOM_DECAY_BASE,
  ZOOM_DECAY_RATE,
  MAX_FRAME_DT,
  clampFrameDt,
} from '../canvas/camera2d';
import type { Camera } from '../canvas/camera2d';

function coasting(vx: number, vy: number, ax = 0, ay = 0): Camera {
  return {
    ...createCamera(),
    motion: { kind: 'inertial', velocity: { x: vx, y: vy }, acceleration: { x: ax, y: ay } },
  };
}

function tickAll(camera: Camera, dts: number[]): Camera {
  return dts.reduce(tickCamera, camera);
}

describe('camera2d.ts', () => {
  describe('createCamera', () => {
    it('starts at rest with unit zoom and no frame history', () => {
      const cam = createCamera({ x: 5, y: 6 });
      expect(cam.position).toEqual({ x: 5, y: 6 });
      expect(cam.motion).toEqual(INERTIAL_REST);
      expect(cam.zoom).toBe(1);
      expect(cam.targetZoom).toBe(1);
      expect(cam.lastDt).toBe(0);
    });
  });

  // ── Zoom smoothing ──
  describe('zoom smoothing', () => {
    it('moves zoom toward targetZoom by the exponential factor', () => {
      const cam = tickCamera(setTargetZoom(createCamera(), 2), 1);
      const expected = 1 + (2 - 1) * (1 - ZOOM_DECAY_BASE ** (-ZOOM_DECAY_RATE * 1));
      expect(cam.zoom).toBeCloseTo(expected, 12);
      expect(cam.zoom).toBeLessThan(2);
    });

    it('converges at the same rate regardless of frame size', () => {
      const start = setTargetZoom(createCamera(), 8);
      const coarse = tickAll(start, [0.5]);
      const fine = tickAll(start, [0.125, 0.125, 0.125, 0.125]);
      expect(fine.zoom).toBeCloseTo(coarse.zoom, 10);
    });

    it('keeps zoom positive for any non-negative dt', () => {
      for (const target of [0.125, 1, 64]) {
        for (const dt of [0, 1 / 144, 1 / 30, 1, 1000]) {
          const cam = tickCamera(setTargetZoom(createCamera(), target), dt);
          expect(cam.zoom).toBeGreaterThan(0);
        }
      }
    });

    it('leaves zoom alone when dt is zero', () => {
      const cam = tickCamera(setTargetZoom(createCamera(), 4), 0);
      expect(cam.zoom).toBe(1);
    });
  });

  // ── Inertial motion ──
  describe('inertial motion', () => {
    it('integrates position from velocity, then damps velocity', () => {
      const cam = tickCamera(coasting(100, 0), 0.5);
      expect(cam.position.x).toBeCloseTo(50, 10);
      expect(cameraVelocity(cam).x).toBeCloseTo(100 * CAMERA_DAMPING ** 0.5, 10);
    });

    it('applies acceleration to velocity after moving', () => {
      const cam = tickCamera(coasting(0, 0, 10, 0), 1);
      expect(cam.position.x).toBe(0);
      expect(cameraVelocity(cam).x).toBeCloseTo(10 * CAMERA_DAMPING, 12);
    });

    it('damps to v0 · damping^t for any split of t', () => {
      const dts = [0.1, 0.25, 0.05, 0.6];
      const t = dts.reduce((a, b) => a + b, 0);
      const cam = tickAll(coasting(100, -40), dts);
      expect(cameraVelocity(cam).x).toBeCloseTo(100 * CAMERA_DAMPING ** t, 8);
      expect(cameraVelocity(cam).y).toBeCloseTo(-40 * CAMERA_DAMPING ** t, 8);
    });

    it('records the previous position and dt', () => {
      const cam = tickCamera(coasting(10, 0), 0.25);
      expect(cam.lastPosition).toEqual({ x: 0, y: 0 });
      expect(cam.lastDt).toBe(0.25);
    });
  });

  // ── Easing ──
  describe('easeCameraTo', () => {
    it('drops inertial velocity and starts from the current position', () => {
      const cam = easeCameraTo({ ...coasting(50, 50), position: { x: 3, y: 4 } }, { x: 100, y: 0 });
      expect(cam.motion).toEqual({ kind: 'easing', start: { x: 3, y: 4 }, target: { x: 100, y: 0 }, elapsed: 0 });
      expect(cameraVelocity(cam)).toEqual({ x: 0, y: 0 });
    });

    it('replaces an ease already in flight', () => {
      let cam = easeCameraTo(createCamera(), { x: 100, y: 0 });
      cam = tickAll(cam, [0.5, 0.5]);
      cam = easeCameraTo(cam, { x: 0, y: 200 });
      expect(cam.motion).toEqual({ kind: 'easing', start: { x: 96.875, y: 0 }, target: { x: 0, y: 200 }, elapsed: 0 });
    });

    it('follows the ease-out curve', () => {
      let cam = easeCameraTo(createCamera(), { x: 100, y: 0 });
      cam = tickCamera(cam, 0.5);
      expect(cam.position).toEqual({ x: 0, y: 0 });
      cam = tickCamera(cam, 0.5);
      expect(cam.position.x).toBeCloseTo(100 * easeOutExpo(0.5), 10);
      expect(cam.position.x).toBeCloseTo(96.875, 10);
    });

    it('snaps exactly onto the target once elapsed passes the duration', () => {
      let cam = easeCameraTo(createCamera(), { x: 100, y: -20 });
      cam = tickAll(cam, [0.5, 0.7]);
      expect(cam.motion.kind).toBe('easing');
      cam = tickCamera(cam, 0.1);
      expect(cam.position).toEqual({ x: 100, y: -20 });
      expect(cam.motion).toEqual(INERTIAL_REST);
    });

    it('lands on the target for any step size', () => {
      for (const dt of [0.25, 1 / 60, 0.4, 2]) {
        let cam = easeCameraTo(createCamera({ x: 10, y: 10 }), { x: 333, y: -71 });
        let ticks = 0;
        while (cam.motion.kind === 'easing' && ticks < 1000) {
          cam = tickCamera(cam, dt);
          ticks++;
        }
        expect(cam.position).toEqual({ x: 333, y: -71 });
        expect(ticks * dt).toBeGreaterThan(1);
      }
    });

    it('ignores acceleration while easing', () => {
      const cam = easeCameraTo(createCamera(), { x: 100, y: 0 });
      expect(setAcceleration(cam, { x: 500, y: 0 })).toBe(cam);
    });
  });

  describe('releaseEasing', () => {
    it('keeps the momentum implied by the last frame', () => {
      let cam = easeCameraTo(createCamera(), { x: 100, y: 0 });
      cam = tickAll(cam, [0.5, 0.5]);
      cam = releaseEasing(cam);
      expect(cam.motion).toEqual({
        kind: 'inertial',
        velocity: { x: 96.875 / 0.5, y: 0 },
        acceleration: { x: 0, y: 0 },
      });
      expect(cam.position.x).toBeCloseTo(96.875, 10);
    });

    it('is a no-op while inertial', () => {
      const cam = coasting(12, 3);
      expect(releaseEasing(cam)).toBe(cam);
    });

    it('uses zero velocity before the first tick', () => {
      const cam = releaseEasing(easeCameraTo(createCamera({ x: 10, y: 10 }), { x: 90, y: 90 }));
      expect(cam.motion).toEqual(INERTIAL_REST);
      expect(cam.position).toEqual({ x: 10, y: 10 });
    });
  });

  describe('helpers', () => {
    it('cameraFocus is the ease target while easing, else the position', () => {
      const still = createCamera({ x: 7, y: 8 });
      expect(cameraFocus(still)).toEqual({ x: 7, y: 8 });
      expect(cameraFocus(easeCameraTo(still, { x: 1, y: 2 }))).toEqual({ x: 1, y: 2 });
    });

    it('stopCamera zeroes inertial velocity but keeps acceleration', () => {
      const cam = stopCamera(coasting(40, 40, 1, 2));
      expect(cam.motion).toEqual({ kind: 'inertial', velocity: { x: 0, y: 0 }, acceleration: { x: 1, y: 2 } });
    });

    it('setAcceleration returns the same camera when nothing changes', () => {
      const cam = coasting(0, 0, 3, 4);
      expect(setAcceleration(cam, { x: 3, y: 4 })).toBe(cam);
      expect(setAcceleration(cam, { x: 0, y: 4 }).motion).toEqual({
        kind: 'inertial', velocity: { x: 0, y: 0 }, acceleration: { x: 0, y: 4 },
      });
    });
  });

  describe('clampFrameDt', () => {
    it('passes ordinary frame times through', () => {
      expect(clampFrameDt(1 / 60)).toBe(1 / 60);
    });

    it('never goes negative', () => {
      expect(clampFrameDt(-0.004)).toBe(0);
      expect(clampFrameDt(Number.NaN)).toBe(0);
    });

    it('caps long pauses', () => {
      expect(clampFrameDt(12)).toBe(MAX_FRAME_DT);
    });
  });
});
