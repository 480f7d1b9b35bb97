// Runtime adapter interfaces for portability.
// Keep these small so the core logic stays free of host APIs.

export type PathApi = {
  resolve: (...parts: string[]) => string;
  dirname: (p: string) => string;
  basename: (p: string) => string;
  isAbsolute: (p: string) => boolean;
};

export type IO = {
  readText: (path: string) => Promise<string>;
  exists: (path: string) => Promise<boolean>;
  cwd: () => string;
  path: PathApi;
};

export type Transport = {
  fetch: (url: string, init: RequestInit) => Promise<Response>;
};

// ============================================================================
// Engine Events
// The core never logs. Front ends subscribe through an EventSink instead.
// ============================================================================

export type EngineEvent =
  | { type: 'resolveStarted'; method: string; url: string }
  | { type: 'resolveFinished'; method: string; url: string }
  | { type: 'fetchStarted'; method: string; url: string }
  | { type: 'fetchFinished'; method: string; url: string; status: number; ttfb: number }
  | { type: 'redirectFollowed'; status: number; from: string; to: string }
  | { type: 'responseStored'; name: string; status: number }
  | { type: 'environmentLoaded'; path: string; environments: string[] }
  | { type: 'error'; stage: string; message: string };

export type EventSink = (event: EngineEvent) => void;
