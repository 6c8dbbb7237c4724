/**
 * keyboard.ts: Logical keys and the held-key map that drives inertial panning.
 */

import type { Vector2 } from '../model/vector2';
import { CAMERA_SPEED } from './camera2d';

export type DirectionKey = 'up' | 'down' | 'left' | 'right';
export type CommandKey = 'previous' | 'next' | 'recenter' | 'zoomIn' | 'zoomOut' | 'colorPick' | 'insert';
export type LogicalKey = DirectionKey | CommandKey;

export type KeyAction = 'press' | 'release' | 'repeat';

export interface KeyEvent {
  key: LogicalKey;
  action: KeyAction;
}

export type HeldKeys = Record<DirectionKey, boolean>;

export const NO_KEYS_HELD: HeldKeys = { up: false, down: false, left: false, right: false };

/** DOM `KeyboardEvent.key` → logical key. Letters are matched case-insensitively. */
export const DEFAULT_KEYMAP: Readonly<Record<string, LogicalKey>> = {
  w: 'up',
  ArrowUp: 'up',
  a: 'left',
  ArrowLeft: 'left',
  s: 'down',
  ArrowDown: 'down',
  d: 'right',
  ArrowRight: 'right',
  ',': 'previous',
  '.': 'next',
  '/': 'recenter',
  '=': 'zoomIn',
  '+': 'zoomIn',
  '-': 'zoomOut',
  '\\': 'colorPick',
  Enter: 'insert',
};

export function resolveKey(
  domKey: string,
  keymap: Readonly<Record<string, LogicalKey>> = DEFAULT_KEYMAP,
): LogicalKey | null {
  for (const candidate of [domKey, domKey.toLowerCase()]) {
    if (Object.hasOwn(keymap, candidate)) return keymap[candidate];
  }
  return null;
}

export function isDirectionKey(key: LogicalKey): key is DirectionKey {
  return key === 'up' || key === 'down' || key === 'left' || key === 'right';
}

/** Navigation offset for previous / next / recenter */
export function navigationOffset(key: LogicalKey): number | null {
  switch (key) {
    case 'previous': return -1;
    case 'next': return 1;
    case 'recenter': return 0;
    default: return null;
  }
}

/** Constant screen-space speed: world acceleration shrinks as zoom grows. */
export function accelerationFromKeys(held: HeldKeys, zoom: number): Vector2 {
  const magnitude = CAMERA_SPEED / zoom;
  return {
    x: (Number(held.right) - Number(held.left)) * magnitude,
    y: (Number(held.down) - Number(held.up)) * magnitude,
  };
}
