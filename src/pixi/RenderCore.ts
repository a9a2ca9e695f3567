import * as PIXI from 'pixi.js';
import { RENDER_TIME_STEP } from '../config';
import { RenderCoreError, RenderCoreErrorCode } from '../types/errors';
import { FLOAT_BYTES, VERTEX_STRIDE } from '../types/render.types';
import { FRAGMENT_SHADER, VERTEX_SHADER } from './shaders';

export type RenderCoreState = 'uninitialized' | 'initialized' | 'running' | 'destroyed';

export interface RenderCoreOptions {
  width?: number;
  height?: number;
  /** Added to the elapsed time on every animation frame. */
  timeStep?: number;
}

const STRIDE_BYTES = VERTEX_STRIDE * FLOAT_BYTES;

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Owns one WebGL surface: a single shader program, one interleaved vertex
 * buffer (position + colour) and an animation loop that advances the `uTime`
 * uniform once per frame.
 *
 * `initialize` runs once; `start` is a no-op while the loop is running, so a
 * second caller never ends up with a second loop. The loop checks its state
 * (and the optional abort signal) before doing any work on each frame.
 */
export class RenderCore {
  private readonly canvas: HTMLCanvasElement;
  private readonly options: RenderCoreOptions;
  private readonly timeStep: number;

  private renderer: PIXI.Renderer | null = null;
  private vertexBuffer: PIXI.Buffer | null = null;
  private shader: PIXI.Shader | null = null;
  private mesh: PIXI.Mesh<PIXI.Shader> | null = null;

  private state: RenderCoreState = 'uninitialized';
  private elapsedTime = 0;
  private animFrame: number | null = null;
  private signal: AbortSignal | null = null;

  constructor(canvas: HTMLCanvasElement, options: RenderCoreOptions = {}) {
    this.canvas = canvas;
    this.options = options;
    this.timeStep = options.timeStep ?? RENDER_TIME_STEP;
  }

  initialize(vertices: Float32Array): void {
    if (this.state !== 'uninitialized') return;

    let renderer: PIXI.Renderer;
    try {
      renderer = new PIXI.Renderer({
        view: this.canvas,
        width: this.options.width ?? (this.canvas.clientWidth || this.canvas.width),
        height: this.options.height ?? (this.canvas.clientHeight || this.canvas.height),
        backgroundAlpha: 0,
        antialias: true,
      });
    } catch (err) {
      throw new RenderCoreError(
        RenderCoreErrorCode.CONTEXT_UNAVAILABLE,
        `WebGL context unavailable: ${errorMessage(err)}`,
        err,
      );
    }

    this.renderer = renderer;
    try {
      const buffer = new PIXI.Buffer(vertices, true, false);
      const geometry = new PIXI.Geometry()
        .addAttribute('aPosition', buffer, 3, false, PIXI.TYPES.FLOAT, STRIDE_BYTES, 0)
        .addAttribute('aColor', buffer, 4, false, PIXI.TYPES.FLOAT, STRIDE_BYTES, 3 * FLOAT_BYTES);
      this.vertexBuffer = buffer;

      this.shader = PIXI.Shader.from(VERTEX_SHADER, FRAGMENT_SHADER, { uTime: 0 });
      this.checkProgram(renderer, this.shader);

      // Triangles come out of the geometry builder counter-clockwise.
      const state = PIXI.State.for2d();
      state.culling = true;
      state.clockwiseFrontFace = false;
      this.mesh = new PIXI.Mesh(geometry, this.shader, state, PIXI.DRAW_MODES.TRIANGLES);

      this.elapsedTime = 0;
      this.draw();
      this.checkBuffer(renderer, buffer);
    } catch (err) {
      this.releaseResources();
      renderer.destroy(false);
      this.renderer = null;
      if (err instanceof RenderCoreError) throw err;
      throw new RenderCoreError(
        RenderCoreErrorCode.BUFFER_FAILED,
        `Render core initialization failed: ${errorMessage(err)}`,
        err,
      );
    }

    this.state = 'initialized';
    console.log(`[render-core] Initialized with ${vertices.length / VERTEX_STRIDE} vertices`);
  }

  /**
   * Begin repainting on every animation frame. Aborting `signal` stops the
   * loop the same way `stop()` does.
   */
  start(signal?: AbortSignal): void {
    if (this.state === 'running') return;
    if (this.state !== 'initialized') {
      throw new RenderCoreError(
        RenderCoreErrorCode.NOT_INITIALIZED,
        `Cannot start render loop from state '${this.state}'`,
      );
    }
    if (signal?.aborted) return;

    this.signal = signal ?? null;
    signal?.addEventListener('abort', this.stop, { once: true });
    this.state = 'running';
    this.animFrame = requestAnimationFrame(this.step);
  }

  readonly stop = (): void => {
    if (this.state !== 'running') return;
    if (this.animFrame !== null) cancelAnimationFrame(this.animFrame);
    this.animFrame = null;
    this.signal?.removeEventListener('abort', this.stop);
    this.signal = null;
    this.state = 'initialized';
  };

  /**
   * Replace the whole vertex buffer. The next frame draws the new contents.
   */
  setVertices(vertices: Float32Array): void {
    if (!this.vertexBuffer) return;
    this.vertexBuffer.update(vertices);
    if (this.state === 'initialized') this.draw();
  }

  resize(width: number, height: number): void {
    if (!this.renderer) return;
    this.renderer.resize(width, height);
    if (this.state === 'initialized') this.draw();
  }

  destroy(): void {
    if (this.state === 'destroyed') return;
    this.stop();
    this.releaseResources();
    this.renderer?.destroy(false);
    this.renderer = null;
    this.state = 'destroyed';
  }

  getState(): RenderCoreState {
    return this.state;
  }

  getElapsedTime(): number {
    return this.elapsedTime;
  }

  private readonly step = (): void => {
    this.animFrame = null;
    if (this.state !== 'running' || this.signal?.aborted) return;

    this.elapsedTime += this.timeStep;
    this.draw();
    this.animFrame = requestAnimationFrame(this.step);
  };

  private draw(): void {
    if (!this.renderer || !this.mesh || !this.shader) return;
    this.shader.uniforms.uTime = this.elapsedTime;
    this.renderer.render(this.mesh);
  }

  private checkProgram(renderer: PIXI.Renderer, shader: PIXI.Shader): void {
    const glProgram = renderer.shader.bind(shader, true);
    const gl = renderer.gl;
    if (!gl.getProgramParameter(glProgram.program, gl.LINK_STATUS)) {
      throw new RenderCoreError(
        RenderCoreErrorCode.PROGRAM_FAILED,
        `Shader program failed to link: ${gl.getProgramInfoLog(glProgram.program) ?? 'no log'}`,
      );
    }
  }

  private checkBuffer(renderer: PIXI.Renderer, buffer: PIXI.Buffer): void {
    const glBuffer = buffer._glBuffers[renderer.CONTEXT_UID];
    if (!glBuffer?.buffer) {
      throw new RenderCoreError(RenderCoreErrorCode.BUFFER_FAILED, 'Vertex buffer was not created');
    }
  }

  private releaseResources(): void {
    this.mesh?.destroy();
    this.shader?.destroy();
    this.mesh = null;
    this.shader = null;
    this.vertexBuffer = null;
  }
}
