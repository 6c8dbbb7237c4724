/**
 * interaction.ts: Canvas pointer logic.
 * Element hit-testing, nearest-element navigation, selection and drag.
 */

import type { Vector2 } from '../model/vector2';
import { add, sub, floor, distance, within } from '../model/vector2';
import type { TableElement } from '../model/elements';
import { ELEMENT_SIZE, HIT_INSET } from '../model/elements';

// ── Hit-testing ──

/** Hit box of an element in world space: [topLeft, bottomRight) */
export function elementHitBox(el: TableElement): [Vector2, Vector2] {
  return [
    add(el.position, { x: HIT_INSET, y: HIT_INSET }),
    add(el.position, { x: ELEMENT_SIZE - HIT_INSET, y: ELEMENT_SIZE - HIT_INSET }),
  ];
}

/**
 * Element under a world point. Overlapping boxes are a data error;
 * when they happen the last match in table order wins.
 */
export function hitTestElement(elements: readonly TableElement[], world: Vector2): TableElement | null {
  let hit: TableElement | null = null;
  for (const el of elements) {
    const [tl, br] = elementHitBox(el);
    if (within(world, tl, br)) hit = el;
  }
  return hit;
}

// ── Navigation ──

/**
 * Index of the element whose top-left is closest to `ref`.
 * Ties keep the first index. Returns -1 for an empty list.
 */
export function findNearestElement(elements: readonly TableElement[], ref: Vector2): number {
  let best = -1;
  let bestDist = Infinity;
  elements.forEach((el, i) => {
    const d = distance(el.position, ref);
    if (d < bestDist) {
      bestDist = d;
      best = i;
    }
  });
  return best;
}

/** (index + offset) mod count, never negative */
export function advanceIndex(index: number, offset: number, count: number): number {
  return (((index + offset) % count) + count) % count;
}

// ── Selection + drag ──

export type DragState =
  | { phase: 'idle' }
  | { phase: 'dragging'; offset: Vector2 };

export const DRAG_IDLE: DragState = { phase: 'idle' };

export interface PointerFrame {
  screen: Vector2;
  hovered: boolean;          // pointer is over the canvas, not a panel
  primaryClicked: boolean;
  secondaryClicked: boolean;
}

export interface PointerState {
  activeElementId: string | null;
  drag: DragState;
  wasDragging: boolean;      // dragging at the end of the previous frame
}

export interface PointerStep extends PointerState {
  /** New position for the active element, when a drag moved it this frame */
  moved: { id: string; position: Vector2 } | null;
}

/**
 * One frame of the selection and drag state machines.
 *
 * Secondary click on an element starts a drag, unless a drag was running on
 * the previous frame; a second secondary click ends it. While dragging, the
 * active element follows the pointer at the offset captured when the drag began.
 */
export function stepPointer(
  state: PointerState,
  elements: readonly TableElement[],
  world: Vector2,
  pointer: PointerFrame,
): PointerStep {
  let { activeElementId, drag } = state;
  let justStarted = false;

  const hit = pointer.hovered ? hitTestElement(elements, world) : null;
  if (hit) {
    if (pointer.primaryClicked) activeElementId = hit.id;
    if (pointer.secondaryClicked && !state.wasDragging) {
      activeElementId = hit.id;
      drag = { phase: 'dragging', offset: sub(hit.position, world) };
      justStarted = true;
    }
  } else if (pointer.hovered && pointer.primaryClicked) {
    activeElementId = null;
  }

  const wasDragging = drag.phase === 'dragging';
  let moved: PointerStep['moved'] = null;

  if (drag.phase === 'dragging' && !justStarted) {
    const active = activeElementId === null
      ? undefined
      : elements.find(el => el.id === activeElementId);
    if (!active || pointer.secondaryClicked) {
      drag = DRAG_IDLE;
    } else {
      moved = { id: active.id, position: floor(add(world, drag.offset)) };
    }
  }

  return { activeElementId, drag, wasDragging, moved };
}
