import { create } from 'zustand';
import { readReplayFile, type ReadReplayFile, type ReplaySource } from '../api/replayFiles';
import type { SceneLayer } from '../pixi/SceneBuilder';
import { jsonReplayDecoder, type ReplayDecoder } from '../services/replay-decoder';
import { processReplay } from '../services/replay-processor';
import { isAbortError } from '../types/errors';
import type { ProcessedReplay } from '../types/replay.types';

export interface FileFailure {
  name: string;
  stage: 'read' | 'parse';
  message: string;
}

export interface ReplayState {
  // Data
  replays: ProcessedReplay[];
  pending: string[];
  failures: FileFailure[];

  // View
  selectedIndex: number | null;
  currentFrame: number;
  layers: Record<SceneLayer, boolean>;

  // Actions
  loadFiles: (files: readonly ReplaySource[]) => Promise<void>;
  cancelRead: (name: string) => void;
  selectReplay: (index: number) => void;
  setCurrentFrame: (frame: number) => void;
  toggleLayer: (layer: SceneLayer) => void;
  dismissFailure: (name: string) => void;
  reset: () => void;
}

export interface ReplayStoreOptions {
  decoder?: ReplayDecoder;
  readFile?: ReadReplayFile;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function selectedReplay(state: Pick<ReplayState, 'replays' | 'selectedIndex'>): ProcessedReplay | null {
  return state.selectedIndex === null ? null : state.replays[state.selectedIndex] ?? null;
}

/**
 * Each file is read and processed on its own; one failing or cancelled file
 * never affects the others. Replays are appended in completion order.
 */
export function createReplayStore(options: ReplayStoreOptions = {}) {
  const decoder = options.decoder ?? jsonReplayDecoder;
  const readFile = options.readFile ?? readReplayFile;
  const controllers = new Map<string, AbortController>();

  return create<ReplayState>((set, get) => {
    const finish = (name: string, controller: AbortController) => {
      if (controllers.get(name) !== controller) return;
      controllers.delete(name);
      set((s) => ({ pending: s.pending.filter((n) => n !== name) }));
    };

    const fail = (failure: FileFailure) => {
      console.error(`[replay-store] ${failure.name} (${failure.stage}): ${failure.message}`);
      set((s) => ({ failures: [...s.failures, failure] }));
    };

    const loadOne = async (file: ReplaySource) => {
      const { name } = file;
      controllers.get(name)?.abort();
      const controller = new AbortController();
      controllers.set(name, controller);
      set((s) => ({
        pending: s.pending.includes(name) ? s.pending : [...s.pending, name],
        failures: s.failures.filter((f) => f.name !== name),
      }));

      let data: Uint8Array;
      try {
        data = await readFile(file, controller.signal);
      } catch (err) {
        if (isAbortError(err) || controller.signal.aborted) return;
        fail({ name, stage: 'read', message: errorMessage(err) });
        finish(name, controller);
        return;
      }
      if (controller.signal.aborted) return;

      try {
        const replay = processReplay(name, data, decoder);
        set((s) => ({
          replays: [...s.replays, replay],
          selectedIndex: s.selectedIndex ?? s.replays.length,
        }));
      } catch (err) {
        fail({ name, stage: 'parse', message: errorMessage(err) });
      }
      finish(name, controller);
    };

    return {
      replays: [],
      pending: [],
      failures: [],
      selectedIndex: null,
      currentFrame: 0,
      layers: {
        map: true,
        units: true,
      },

      loadFiles: async (files) => {
        await Promise.all(files.map(loadOne));
      },

      cancelRead: (name) => {
        const controller = controllers.get(name);
        if (!controller) return;
        controller.abort();
        controllers.delete(name);
        set((s) => ({ pending: s.pending.filter((n) => n !== name) }));
      },

      selectReplay: (index) => {
        if (index < 0 || index >= get().replays.length) return;
        set({ selectedIndex: index, currentFrame: 0 });
      },

      setCurrentFrame: (frame) => {
        const replay = selectedReplay(get());
        const max = replay ? replay.totalFrames : 0;
        set({ currentFrame: Math.min(Math.max(frame, 0), max) });
      },

      toggleLayer: (layer) => {
        set((s) => ({
          layers: { ...s.layers, [layer]: !s.layers[layer] },
        }));
      },

      dismissFailure: (name) => {
        set((s) => ({ failures: s.failures.filter((f) => f.name !== name) }));
      },

      reset: () => {
        for (const controller of controllers.values()) controller.abort();
        controllers.clear();
        set({
          replays: [],
          pending: [],
          failures: [],
          selectedIndex: null,
          currentFrame: 0,
        });
      },
    };
  });
}

export type ReplayStore = ReturnType<typeof createReplayStore>;

export const useReplayStore = createReplayStore();
