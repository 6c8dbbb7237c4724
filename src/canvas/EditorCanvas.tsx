import { useEffect, useRef } from 'react';
import type { PointerEvent as ReactPointerEvent } from 'react';
import { useEditorStore } from '../store/useEditorStore';
import type { FrameResult } from '../store/useEditorStore';
import type { PointerFrame } from './interaction';
import { resolveKey } from './keyboard';
import type { KeyAction } from './keyboard';
import { clearViewport, drawCrosshair, drawElementOutlines, drawHoverHighlight, drawTableImage } from './renderer';
import { ZoomControls } from './components/ZoomControls';
import { sampleTableColor } from './colorPick';
import type { PixelSource } from './colorPick';
import type { EditorConfig } from '../config';
import { resolveImageUrl } from '../config';
import type { Vector2 } from '../model/vector2';
import { logger } from '../utils/logger';

interface LoadedImage {
  table: string;
  img: HTMLImageElement;
  pixels: PixelSource | null;
}

/** Copy of the table image on an offscreen canvas, for colour picking */
function createPixelSource(table: string, img: HTMLImageElement): PixelSource | null {
  const off = document.createElement('canvas');
  off.width = img.naturalWidth;
  off.height = img.naturalHeight;
  const ctx = off.getContext('2d', { willReadFrequently: true });
  if (!ctx) return null;
  ctx.drawImage(img, 0, 0);
  return {
    table,
    read: (at) => {
      const [r, g, b] = ctx.getImageData(at.x, at.y, 1, 1).data;
      return { r, g, b };
    },
  };
}

function isTextInput(target: EventTarget | null): boolean {
  return target instanceof HTMLInputElement
    || target instanceof HTMLTextAreaElement
    || (target instanceof HTMLElement && target.isContentEditable);
}

export default function EditorCanvas({ config }: { config: EditorConfig }) {
  const canvasRef = useRef<HTMLCanvasElement>(null);
  const imageRef = useRef<LoadedImage | null>(null);
  const pointerRef = useRef<PointerFrame>({
    screen: { x: 0, y: 0 },
    hovered: false,
    primaryClicked: false,
    secondaryClicked: false,
  });

  const activeTableName = useEditorStore(s => s.activeTableName);
  const activeTablePath = useEditorStore(s => s.tables.find(t => t.name === s.activeTableName)?.path);
  const setTableSize = useEditorStore(s => s.setTableSize);
  const pushKey = useEditorStore(s => s.pushKey);
  const releaseAllKeys = useEditorStore(s => s.releaseAllKeys);

  // ── Table image ──
  useEffect(() => {
    if (!activeTablePath) return;
    let cancelled = false;
    const img = new Image();
    img.onload = () => {
      if (cancelled) return;
      imageRef.current = { table: activeTableName, img, pixels: createPixelSource(activeTableName, img) };
      setTableSize(activeTableName, { x: img.naturalWidth, y: img.naturalHeight });
    };
    img.onerror = () => logger.error(`Failed to load table image ${activeTablePath}`);
    img.src = resolveImageUrl(config, activeTablePath);
    return () => {
      cancelled = true;
    };
  }, [activeTableName, activeTablePath, config, setTableSize]);

  // ── Keyboard ──
  useEffect(() => {
    const handler = (e: KeyboardEvent) => {
      const key = resolveKey(e.key);
      if (!key || e.ctrlKey || e.metaKey || e.altKey) return;
      const wantTextInput = isTextInput(e.target);
      if (!wantTextInput) e.preventDefault();
      const action: KeyAction = e.type === 'keyup' ? 'release' : e.repeat ? 'repeat' : 'press';
      pushKey(key, action, wantTextInput);
    };
    // No keyup arrives for keys still down when the window loses focus
    const onBlur = () => releaseAllKeys();
    window.addEventListener('keydown', handler);
    window.addEventListener('keyup', handler);
    window.addEventListener('blur', onBlur);
    return () => {
      window.removeEventListener('keydown', handler);
      window.removeEventListener('keyup', handler);
      window.removeEventListener('blur', onBlur);
    };
  }, [pushKey, releaseAllKeys]);

  // ── Frame loop: controller first, then render ──
  useEffect(() => {
    let raf = 0;
    let last: number | null = null;

    const pickColor = (at: Vector2) => {
      const store = useEditorStore.getState();
      const hex = sampleTableColor(imageRef.current?.pixels ?? null, store.activeTableName, at);
      if (hex === null) {
        // Image for this table not loaded yet: try again next frame
        store.requestColorPick();
        return;
      }
      navigator.clipboard.writeText(hex).then(
        () => logger.info(`Copied ${hex} from (${at.x}, ${at.y})`),
        (err: unknown) => logger.error('Clipboard write failed', err),
      );
    };

    const render = (canvas: HTMLCanvasElement, viewport: Vector2, result: FrameResult) => {
      const dpr = window.devicePixelRatio || 1;
      const w = Math.round(viewport.x * dpr);
      const h = Math.round(viewport.y * dpr);
      if (canvas.width !== w || canvas.height !== h) {
        canvas.width = w;
        canvas.height = h;
      }
      const ctx = canvas.getContext('2d');
      if (!ctx) return;
      ctx.setTransform(dpr, 0, 0, dpr, 0, 0);

      const state = useEditorStore.getState();
      const table = state.getActiveTable();
      clearViewport(ctx, viewport);
      if (!table) return;

      const loaded = imageRef.current;
      if (loaded && loaded.table === table.name) {
        drawTableImage(ctx, loaded.img, table.size, state.camera, viewport);
      }
      drawElementOutlines(ctx, table.elements, result.hoveredElementId, state.camera, viewport);
      const hovered = table.elements.find(el => el.id === result.hoveredElementId);
      if (hovered) drawHoverHighlight(ctx, hovered, state.camera, viewport);
      if (state.colorPicking && pointerRef.current.hovered) drawCrosshair(ctx, pointerRef.current.screen);
    };

    const loop = (now: number) => {
      const dt = last === null ? 0 : (now - last) / 1000;
      last = now;
      const canvas = canvasRef.current;
      if (canvas) {
        const viewport = { x: canvas.clientWidth, y: canvas.clientHeight };
        const pointer = pointerRef.current;
        const result = useEditorStore.getState().frame(dt, viewport, pointer);
        pointer.primaryClicked = false;
        pointer.secondaryClicked = false;
        if (result.colorPickAt) pickColor(result.colorPickAt);
        render(canvas, viewport, result);
      }
      raf = requestAnimationFrame(loop);
    };

    raf = requestAnimationFrame(loop);
    return () => cancelAnimationFrame(raf);
  }, []);

  const updatePointer = (e: ReactPointerEvent<HTMLCanvasElement>) => {
    const rect = e.currentTarget.getBoundingClientRect();
    pointerRef.current.screen = { x: e.clientX - rect.left, y: e.clientY - rect.top };
  };

  return (
    <div className="relative w-full h-full">
      <canvas
        ref={canvasRef}
        className="block w-full h-full"
        onPointerMove={updatePointer}
        onPointerEnter={(e) => {
          pointerRef.current.hovered = true;
          updatePointer(e);
        }}
        onPointerLeave={() => {
          pointerRef.current.hovered = false;
        }}
        onPointerDown={(e) => {
          updatePointer(e);
          if (e.button === 0) pointerRef.current.primaryClicked = true;
          if (e.button === 2) pointerRef.current.secondaryClicked = true;
        }}
        onContextMenu={(e) => e.preventDefault()}
      />
      <ZoomControls />
    </div>
  );
}
