export type Vec2 = {
  x: number;
  y: number;
};

export type Particle = {
  position: Vec2;
  previousPosition: Vec2;
  force: Vec2;
  mass: number;
  pinned: boolean;
};

export type SpringKind = 'structural' | 'bending' | 'shear';

export type Spring = {
  a: number;
  b: number;
  restLength: number;
  kind: SpringKind;
};

export type Cloth = {
  width: number;
  height: number;
  spacing: number;
  origin: Vec2;
  particles: Particle[];
  springs: Spring[];
};

export type ClothConfig = {
  width: number;
  height: number;
  spacing: number;
  origin: Vec2;
  gravity: Vec2;
  stiffness: number;
  tearThreshold: number;
  iterations: number;
  cutRadius: number;
};

export type PointerState = {
  position: Vec2;
  selectPressed: boolean;
  selectHeld: boolean;
  selectReleased: boolean;
  cutHeld: boolean;
  overUi: boolean;
};

export type InteractionState =
  | { kind: 'idle' }
  | { kind: 'dragging'; particleIndex: number };

export type FrameStats = {
  frame: number;
  tornTotal: number;
  cutTotal: number;
};

export type SegmentRecord = {
  a: Vec2;
  b: Vec2;
};

export type ParticleRecord = {
  position: Vec2;
  pinned: boolean;
};

export type RenderSnapshot = {
  segments: SegmentRecord[];
  particles: ParticleRecord[];
};

export type Result = {
  ok: boolean;
  reason?: string;
};

export type ClothStoreState = {
  cloth: Cloth;
  config: ClothConfig;
  interaction: InteractionState;
  stats: FrameStats;
  cursor: Vec2 | null;
  cutting: boolean;
};

export interface ClothStore {
  getState(): ClothStoreState;
  subscribe(listener: () => void): () => void;
  setConfig(config: Partial<ClothConfig>): void;
  reset(): void;
  update(config: Partial<ClothConfig> | null, pointer: PointerState, dtSeconds: number): Result;
  getRenderSnapshot(): RenderSnapshot;
}
