// vtglyph - main entry point

// Decoder
export {
  Parser,
  Utf8Decoder,
  REPLACEMENT_CHAR,
  type ParserEvent,
  type ParserEventSink,
  type ParserState,
  type PrintEvent,
  type ExecuteEvent,
  type CsiEvent,
  type EscEvent,
  type OscEvent,
  type DcsHookEvent,
  type DcsPutEvent,
  type DcsUnhookEvent,
} from "./parser";

// Screen
export {
  ScreenBuffer,
  EMPTY_CHAR,
  EMPTY_CELL,
  isEmptyCell,
  type AnsiColor,
  type Cell,
  type Cursor,
  type Pen,
  type ScreenBufferOptions,
  type ScreenStats,
  type ScrollRegion,
  type Viewport,
  type VisibleCell,
} from "./screen";

// Terminal + session
export {
  Terminal,
  TerminalSession,
  ChunkQueue,
  type TerminalOptions,
  type TerminalSessionOptions,
} from "./terminal";

// Glyph atlas
export {
  GlyphAtlas,
  AtlasError,
  GuillotinePacker,
  LruCache,
  type AtlasErrorCode,
  type AtlasStats,
  type AtlasUpload,
  type GlyphAtlasOptions,
  type GlyphLookup,
  type GlyphPlacement,
  type GlyphRect,
} from "./atlas";

// Fonts
export {
  createGlyphRasterizer,
  createTextShaperRasterizer,
  loadFontFile,
  loadTextShaperRasterizer,
  type FontSizeMode,
  type GlyphBitmap,
  type GlyphRasterizer,
  type GlyphSource,
  type RasterizedGlyph,
  type RasterizeGlyphFn,
  type TextShaperRasterizerOptions,
} from "./fonts";

// Grid
export {
  computeCellMetrics,
  computeGridSize,
  createGridState,
  fixedCellMetrics,
  updateGridState,
  type CellMetrics,
  type FontMetricsProvider,
  type GridConfig,
  type GridResize,
  type GridState,
} from "./grid";

// Renderer
export {
  buildFrame,
  resolveCellColors,
  DEFAULT_PALETTE,
  GLYPH_STRIDE,
  RECT_STRIDE,
  type BuildFrameOptions,
  type Color,
  type FrameData,
  type FrameResult,
  type FrameSource,
  type GlyphData,
  type Palette,
  type RectData,
} from "./renderer";

// PTY
export {
  createStreamPtyTransport,
  type PtyCallbacks,
  type PtyConnectOptions,
  type PtyLifecycleState,
  type PtyTransport,
  type StreamPtySource,
} from "./pty";

// Input
export {
  createInputHandler,
  encodeKey,
  encodeText,
  wheelDeltaToRows,
  type InputHandler,
  type InputHandlerOptions,
  type NamedKey,
  type ScrollTarget,
} from "./input";

// Config + logging
export {
  DEFAULT_TERMINAL_CONFIG,
  resolveTerminalConfig,
  type TerminalConfig,
  type TerminalConfigOptions,
} from "./config";
export { createConsoleLogger, silentLogger, type Logger, type LogLevel } from "./logger";
