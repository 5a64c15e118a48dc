// ── Lattice ──

/** Graphene lattice constant in Å. */
export const GRAPHENE_LATTICE_CONSTANT = 2.46;

// ── Rendering ──

/** Canvas background color behind the field image. */
export const CANVAS_BG_COLOR = 0x111111;

/** Padding in pixels around the field image inside the canvas. */
export const CANVAS_PADDING = 8;

/** EMA smoothing factor for the draw-time metric. */
export const DRAW_TIME_EMA_ALPHA = 0.2;

// ── Export ──

/** File name offered when downloading the rendered image. */
export const EXPORT_FILE_NAME = "twisted_graphene.png";
