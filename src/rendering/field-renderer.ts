import { Application, BufferImageSource, Sprite, Texture } from "pixi.js";
import type { Field } from "../types/grid-types";
import type { Renderer, RendererOptions, RendererMetrics } from "../types/renderer-types";
import { CANVAS_BG_COLOR, CANVAS_PADDING, DRAW_TIME_EMA_ALPHA } from "../constants";
import { fieldToRGBA } from "../utils/color-utils";
import { fieldRange } from "../utils/grid-utils";

export async function createFieldRenderer(canvas: HTMLCanvasElement, width: number, height: number):
    Promise<Renderer> {
  const app = new Application();
  await app.init({ canvas, width, height, background: CANVAS_BG_COLOR });
  app.ticker.stop();

  // One sprite holds the whole field image; each update swaps its texture.
  const sprite = new Sprite();
  app.stage.addChild(sprite);

  let texture: Texture | null = null;
  let viewWidth = width;
  let viewHeight = height;
  let sceneUpdateTimeMs = 0;

  /** Centers the image as the largest square that fits inside the padding. */
  function layout(): void {
    const size = Math.max(0, Math.min(viewWidth, viewHeight) - 2 * CANVAS_PADDING);
    sprite.width = size;
    sprite.height = size;
    sprite.position.set((viewWidth - size) / 2, (viewHeight - size) / 2);
  }

  function resize(w: number, h: number): void {
    viewWidth = w;
    viewHeight = h;
    app.renderer.resize(w, h);
    if (texture) {
      layout();
      app.render();
    }
  }

  function update(field: Field, opts: RendererOptions): RendererMetrics {
    const sceneT0 = performance.now();
    const { min, max } = fieldRange(field);

    const source = new BufferImageSource({
      resource: fieldToRGBA(field, min, max),
      width: field.cols,
      height: field.rows,
      format: "rgba8unorm",
      scaleMode: "linear",
      // Large fields are drawn downscaled, so sample them through mipmaps.
      autoGenerateMipmaps: true,
    });
    const next = new Texture({ source });
    sprite.texture = next;
    texture?.destroy(true);
    texture = next;

    if (opts.width !== viewWidth || opts.height !== viewHeight) {
      viewWidth = opts.width;
      viewHeight = opts.height;
      app.renderer.resize(viewWidth, viewHeight);
    }
    layout();
    app.render();

    const rawSceneMs = performance.now() - sceneT0;
    sceneUpdateTimeMs = DRAW_TIME_EMA_ALPHA * rawSceneMs + (1 - DRAW_TIME_EMA_ALPHA) * sceneUpdateTimeMs;

    return {
      fieldMin: min,
      fieldMax: max,
      computeTimeMs: opts.computeTimeMs,
      sceneUpdateTimeMs,
    };
  }

  return {
    canvas,
    update,
    resize,
    exportImage() {
      if (!texture) {
        return Promise.reject(new Error("No field has been drawn yet"));
      }
      // Extracting the texture rather than the stage keeps the field's native resolution.
      return app.renderer.extract.base64(texture);
    },
    destroy() {
      texture?.destroy(true);
      texture = null;
      app.destroy();
    },
  };
}
