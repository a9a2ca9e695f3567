import { useEffect, useRef, useState } from 'react';
import { RenderCore } from '../../pixi/RenderCore';
import { SceneBuilder } from '../../pixi/SceneBuilder';
import { selectedReplay, useReplayStore } from '../../state/replayStore';
import { RenderCoreError } from '../../types/errors';

export function MapCanvas() {
  const canvasRef = useRef<HTMLCanvasElement>(null);
  const coreRef = useRef<RenderCore | null>(null);
  const [scene] = useState(() => new SceneBuilder());
  const [status, setStatus] = useState<string | null>(null);

  const replay = useReplayStore(selectedReplay);
  const currentFrame = useReplayStore((s) => s.currentFrame);
  const layers = useReplayStore((s) => s.layers);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;

    let destroyed = false;
    let core: RenderCore | null = null;
    let observer: ResizeObserver | null = null;
    const controller = new AbortController();

    // Built on the next frame: a mount that is torn down straight away
    // never creates a context on this canvas.
    const setup = () => {
      if (destroyed) return;

      const created = new RenderCore(canvas);
      try {
        const s = useReplayStore.getState();
        created.initialize(scene.build(selectedReplay(s), s.currentFrame));
        created.start(controller.signal);
      } catch (err) {
        created.destroy();
        if (!(err instanceof RenderCoreError)) throw err;
        console.error(`[render-core] ${err.code}: ${err.message}`);
        setStatus(err.message);
        return;
      }
      core = created;
      coreRef.current = created;
      setStatus(null);

      const parent = canvas.parentElement;
      if (!parent) return;
      observer = new ResizeObserver(() => {
        const w = parent.clientWidth;
        const h = parent.clientHeight;
        if (w > 0 && h > 0) created.resize(w, h);
      });
      observer.observe(parent);
    };
    const frame = requestAnimationFrame(setup);

    return () => {
      destroyed = true;
      cancelAnimationFrame(frame);
      controller.abort();
      observer?.disconnect();
      core?.destroy();
      coreRef.current = null;
    };
  }, [scene]);

  useEffect(() => {
    scene.setLayerVisibility('map', layers.map);
    scene.setLayerVisibility('units', layers.units);
    coreRef.current?.setVertices(scene.build(replay, currentFrame));
  }, [scene, replay, currentFrame, layers]);

  return (
    <div className="map-canvas">
      <canvas ref={canvasRef} />
      {status && <div className="map-canvas__status">Map unavailable: {status}</div>}
    </div>
  );
}
