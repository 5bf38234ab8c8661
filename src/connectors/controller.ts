// Capability contract for the scene-graph the engine drives. Implementations
// reject on failure; callers decide whether a failure is fatal.

export type SourceKind = 'image' | 'media';

export type SourceSettings = Record<string, string | number | boolean>;

export type SceneItemTransform = {
  positionX: number;
  positionY: number;
  alignment: number;
  scaleX: number;
  scaleY: number;
  cropLeft: number;
  cropTop: number;
  cropRight: number;
  cropBottom: number;
  boundsType: 'OBS_BOUNDS_SCALE_INNER';
  boundsAlignment: number;
  boundsWidth: number;
  boundsHeight: number;
};

export interface PresentationController {
  createScene(name: string): Promise<void>;
  removeScene(name: string): Promise<void>;
  listScenes(): Promise<string[]>;
  setActiveScene(name: string): Promise<void>;
  createSource(scene: string, name: string, kind: SourceKind, settings: SourceSettings): Promise<void>;
  removeSource(name: string): Promise<void>;
  listSources(): Promise<string[]>;
  setSourceMuted(name: string, muted: boolean): Promise<void>;
  getSourceItemId(scene: string, name: string): Promise<number>;
  setSourceTransform(scene: string, itemId: number, transform: SceneItemTransform): Promise<void>;
  setTransitionStyle(name: string): Promise<void>;
}

// obs alignment flags: 0 = centre, 1 = left, 4 = top.
const ALIGN_TOP_LEFT = 5;
const ALIGN_CENTER = 0;

/** Bounding box covering the canvas; the source is scaled inside it and centred. */
export function fitTransform(canvas: { width: number; height: number }): SceneItemTransform {
  return {
    positionX: 0,
    positionY: 0,
    alignment: ALIGN_TOP_LEFT,
    scaleX: 1,
    scaleY: 1,
    cropLeft: 0,
    cropTop: 0,
    cropRight: 0,
    cropBottom: 0,
    boundsType: 'OBS_BOUNDS_SCALE_INNER',
    boundsAlignment: ALIGN_CENTER,
    boundsWidth: canvas.width,
    boundsHeight: canvas.height,
  };
}
