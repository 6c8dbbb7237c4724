import { create } from 'zustand';
import type { Vector2 } from '../model/vector2';
import { ZERO, add, floor, within } from '../model/vector2';
import type { ElementPatch, ExtraElement, Table, TableElement } from '../model/elements';
import {
  ELEMENT_HALF,
  createBlankElement,
  findElementIndex,
  getElement,
  getTable,
  replaceElement,
} from '../model/elements';
import type { ElementDocument, LoadedDocument } from '../model/document';
import { DocumentError, readElementDocument, serializeDocument } from '../model/document';
import type { Camera } from '../canvas/camera2d';
import {
  TABLE_ZOOM,
  cameraFocus,
  createCamera,
  easeCameraTo,
  releaseEasing,
  setAcceleration,
  setTargetZoom,
  stopCamera,
  clampFrameDt,
  tickCamera,
} from '../canvas/camera2d';
import { screenToWorld } from '../canvas/coordinates';
import type { DragState, PointerFrame } from '../canvas/interaction';
import { DRAG_IDLE, advanceIndex, findNearestElement, hitTestElement, stepPointer } from '../canvas/interaction';
import type { HeldKeys, KeyAction, KeyEvent, LogicalKey } from '../canvas/keyboard';
import { NO_KEYS_HELD, accelerationFromKeys, isDirectionKey, navigationOffset } from '../canvas/keyboard';
import { logger } from '../utils/logger';

export interface FrameResult {
  worldMouse: Vector2;
  hoveredElementId: string | null;
  /** Floored world point to sample for a pending colour pick */
  colorPickAt: Vector2 | null;
}

export interface EditorState {
  tables: Table[];
  extras: ExtraElement[];
  activeTableName: string;
  activeElementId: string | null;

  camera: Camera;
  drag: DragState;
  wasDragging: boolean;
  heldKeys: HeldKeys;
  keyQueue: KeyEvent[];
  colorPicking: boolean;

  changedSinceSave: boolean;
  loadError: string | null;

  // Document
  loadDocument: (doc: LoadedDocument) => void;
  /** Parse and load a JSON document. Failures are recorded in `loadError`. */
  importJson: (text: string, source: string) => boolean;
  setLoadError: (message: string | null) => void;
  setTableSize: (name: string, size: Vector2) => void;
  exportDocument: () => ElementDocument;
  markSaved: () => void;

  // Per-frame controller
  pushKey: (key: LogicalKey, action: KeyAction, wantTextInput?: boolean) => void;
  /** Drop every held direction key, e.g. when the window loses focus */
  releaseAllKeys: () => void;
  frame: (dt: number, viewport: Vector2, pointer: PointerFrame) => FrameResult;

  // Commands
  navigate: (offset: number) => void;
  zoomBy: (factor: number) => void;
  resetZoom: () => void;
  requestColorPick: () => void;
  switchTable: (name: string) => void;
  selectElement: (id: string | null) => void;
  insertElement: () => void;
  updateElement: (id: string, patch: ElementPatch) => void;
  removeElement: (id: string) => void;

  // Getters
  getActiveTable: () => Table | undefined;
  getActiveElement: () => TableElement | undefined;

  clearAll: () => void;
}

type EditorData = Pick<EditorState,
  | 'tables' | 'extras' | 'activeTableName' | 'activeElementId'
  | 'camera' | 'drag' | 'wasDragging' | 'heldKeys' | 'keyQueue' | 'colorPicking'
  | 'changedSinceSave' | 'loadError'>;

const initialState = (): EditorData => ({
  tables: [],
  extras: [],
  activeTableName: '',
  activeElementId: null,
  camera: createCamera(),
  drag: DRAG_IDLE,
  wasDragging: false,
  heldKeys: NO_KEYS_HELD,
  keyQueue: [],
  colorPicking: false,
  changedSinceSave: false,
  loadError: null,
});

function mapTables(tables: Table[], id: string, update: (el: TableElement) => TableElement): Table[] {
  return tables.map(t => replaceElement(t, id, update));
}

export const useEditorStore = create<EditorState>()((set, get) => {
  const applyKey = ({ key, action }: KeyEvent) => {
    if (isDirectionKey(key)) {
      set(s => ({
        heldKeys: { ...s.heldKeys, [key]: action !== 'release' },
        camera: action === 'release' ? s.camera : releaseEasing(s.camera),
      }));
      return;
    }
    if (action !== 'press') return;

    switch (key) {
      case 'zoomIn': get().zoomBy(2); break;
      case 'zoomOut': get().zoomBy(0.5); break;
      case 'colorPick': get().requestColorPick(); break;
      case 'insert': get().insertElement(); break;
      default: {
        const offset = navigationOffset(key);
        if (offset !== null) get().navigate(offset);
      }
    }
  };

  return {
    ...initialState(),

    // ── Document ──

    loadDocument: (doc) => {
      set({
        ...initialState(),
        tables: doc.tables,
        extras: doc.extras,
      });
      logger.info(`Loaded ${doc.tables.length} tables, ${doc.extras.length} extras`);
      if (doc.tables.length) get().switchTable(doc.tables[0].name);
    },

    importJson: (text, source) => {
      let doc: LoadedDocument;
      try {
        doc = readElementDocument(JSON.parse(text));
      } catch (err) {
        if (!(err instanceof SyntaxError) && !(err instanceof DocumentError)) throw err;
        const message = err instanceof DocumentError ? err.problems.join('\n') : err.message;
        logger.error(`Could not load ${source}`, message);
        set({ loadError: `${source}: ${message}` });
        return false;
      }
      get().loadDocument(doc);
      return true;
    },

    setLoadError: (message) => set({ loadError: message }),

    setTableSize: (name, size) => set(s => ({
      tables: s.tables.map(t => (t.name === name ? { ...t, size } : t)),
    })),

    exportDocument: () => serializeDocument(get().tables, get().extras),

    markSaved: () => set({ changedSinceSave: false }),

    // ── Per-frame controller ──

    pushKey: (key, action, wantTextInput = false) => {
      // Releases are queued even from a text field
      if (wantTextInput && action !== 'release') return;
      set(s => ({ keyQueue: [...s.keyQueue, { key, action }] }));
    },

    releaseAllKeys: () => set(s => ({
      heldKeys: NO_KEYS_HELD,
      keyQueue: s.keyQueue.filter(ev => !isDirectionKey(ev.key)),
    })),

    frame: (dt, viewport, pointer) => {
      // 1. physics
      set(s => ({ camera: tickCamera(s.camera, clampFrameDt(dt)) }));

      // 2. discrete key events, in arrival order
      const queue = get().keyQueue;
      set({ keyQueue: [] });
      for (const ev of queue) applyKey(ev);

      // 3. held keys → acceleration for the next tick
      set(s => ({ camera: setAcceleration(s.camera, accelerationFromKeys(s.heldKeys, s.camera.zoom)) }));

      // 4. pointer: colour pick, selection, drag
      const s = get();
      const table = s.getActiveTable();
      const elements = table?.elements ?? [];
      const worldMouse = screenToWorld(pointer.screen, s.camera, viewport);

      let colorPickAt: Vector2 | null = null;
      if (s.colorPicking && table && within(worldMouse, ZERO, table.size)) {
        colorPickAt = floor(worldMouse);
        set({ colorPicking: false });
      }

      const hovered = pointer.hovered ? hitTestElement(elements, worldMouse) : null;
      const step = stepPointer(
        { activeElementId: s.activeElementId, drag: s.drag, wasDragging: s.wasDragging },
        elements,
        worldMouse,
        pointer,
      );

      if (step.drag.phase !== s.drag.phase) {
        logger.debug(step.drag.phase === 'dragging' ? `Drag start ${step.activeElementId}` : 'Drag end');
      }
      set({ activeElementId: step.activeElementId, drag: step.drag, wasDragging: step.wasDragging });

      const moved = step.moved;
      if (moved) {
        const current = table ? getElement(table, moved.id) : undefined;
        if (current && (current.position.x !== moved.position.x || current.position.y !== moved.position.y)) {
          set(st => ({
            tables: mapTables(st.tables, moved.id, el => ({ ...el, position: moved.position })),
            changedSinceSave: true,
          }));
        }
      }

      return { worldMouse, hoveredElementId: hovered?.id ?? null, colorPickAt };
    },

    // ── Commands ──

    navigate: (offset) => {
      const { camera } = get();
      const table = get().getActiveTable();
      if (!table || table.elements.length === 0) return;
      const nearest = findNearestElement(table.elements, cameraFocus(camera));
      const idx = advanceIndex(nearest, offset, table.elements.length);
      const target = table.elements[idx];
      logger.debug(`Closest to ${nearest}, moving to ${idx}`);
      set({
        activeElementId: target.id,
        camera: easeCameraTo(camera, add(target.position, ELEMENT_HALF)),
      });
    },

    zoomBy: (factor) => set(s => ({ camera: setTargetZoom(s.camera, s.camera.targetZoom * factor) })),

    resetZoom: () => set(s => ({ camera: setTargetZoom(s.camera, 1) })),

    requestColorPick: () => set({ colorPicking: true }),

    switchTable: (name) => {
      const table = getTable(get().tables, name);
      if (!table) {
        logger.warn(`Unknown table ${name}`);
        return;
      }
      let camera = get().camera;
      if (table.elements.length) camera = easeCameraTo(camera, table.elements[0].position);
      camera = setTargetZoom(stopCamera(camera), TABLE_ZOOM);
      set({ activeTableName: name, activeElementId: null, camera });
    },

    selectElement: (id) => {
      const table = get().getActiveTable();
      if (id !== null && (!table || findElementIndex(table, id) < 0)) return;
      set({ activeElementId: id });
    },

    insertElement: () => {
      const table = get().getActiveTable();
      if (!table) return;
      const el = createBlankElement(floor(get().camera.position));
      set(s => ({
        tables: s.tables.map(t => (t.name === table.name ? { ...t, elements: [...t.elements, el] } : t)),
        activeElementId: el.id,
        changedSinceSave: true,
      }));
      logger.debug(`Inserted element at (${el.position.x}, ${el.position.y})`);
    },

    updateElement: (id, patch) => set(s => ({
      tables: mapTables(s.tables, id, el => ({ ...el, ...patch })),
      changedSinceSave: true,
    })),

    removeElement: (id) => set(s => ({
      tables: s.tables.map(t => (findElementIndex(t, id) < 0
        ? t
        : { ...t, elements: t.elements.filter(el => el.id !== id) })),
      activeElementId: s.activeElementId === id ? null : s.activeElementId,
      changedSinceSave: true,
    })),

    // ── Getters ──

    getActiveTable: () => getTable(get().tables, get().activeTableName),

    getActiveElement: () => {
      const table = get().getActiveTable();
      return table ? getElement(table, get().activeElementId) : undefined;
    },

    clearAll: () => set(initialState()),
  };
});
