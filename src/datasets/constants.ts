export type IconRegion = 'desktop' | 'taskbar';

export interface DatetimeRange {
  start: string;   // ISO-8601, inclusive
  end: string;     // ISO-8601, inclusive
}

export interface SceneContext {
  desktopMinFrac: number;        // vary-N floor for optional desktop icons
  taskbarMinFrac: number;        // vary-N floor for optional taskbar icons
  loadingProbability: number;    // chance the loading indicator is shown
  datetime: DatetimeRange;
}

export const DEFAULT_SCENE_CONTEXT: SceneContext = {
  desktopMinFrac: 0.6,
  taskbarMinFrac: 0.4,
  loadingProbability: 0,
  datetime: { start: '2025-01-01T00:00:00.000Z', end: '2025-12-31T23:59:00.000Z' },
};

export interface SceneState {
  readonly index: number;
  readonly desktopIcons: readonly string[];   // catalog order
  readonly taskbarIcons: readonly string[];   // catalog order
  readonly datetime: string;                  // ISO-8601, minute resolution
  readonly datetimeText: string;              // "3:45 PM\n11/18/2025", as the clock shows it
  readonly loadingVisible: boolean;
  readonly seed: number;
  readonly rngCalls: readonly [number, number]; // stream offsets consumed by this scene
}
