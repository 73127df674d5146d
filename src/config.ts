import { createConsoleLogger, type Logger } from "./logger";

/**
 * Resolved terminal configuration. Every field has a default in
 * {@link DEFAULT_TERMINAL_CONFIG}.
 */
export type TerminalConfig = {
  /** Glyph rasterization size in pixels. */
  fontSize: number;
  /** Fixed cell width in pixels, used when no font metrics are available. */
  cellWidth: number;
  /** Fixed cell height in pixels, used when no font metrics are available. */
  cellHeight: number;
  /** Initial atlas edge length in pixels. */
  atlasInitialSize: number;
  /** Atlas edge length growth stops at. */
  atlasMaxSize: number;
  /** Empty pixels kept around each packed glyph. */
  atlasPadding: number;
  /** Number of (character, size) entries the glyph cache keeps. */
  glyphCacheCapacity: number;
  /** Tab stop interval in columns. */
  tabWidth: number;
  /** Largest number of rows a single wheel event may scroll. */
  maxScrollStep: number;
  /** Enable debug logging of unhandled sequences. */
  debug: boolean;
};

export type TerminalConfigOptions = Partial<TerminalConfig> & {
  /** Receives every log line in addition to the console. */
  onLog?: (line: string) => void;
};

export const DEFAULT_TERMINAL_CONFIG: Readonly<TerminalConfig> = Object.freeze({
  fontSize: 16,
  cellWidth: 16,
  cellHeight: 16,
  atlasInitialSize: 256,
  atlasMaxSize: 4096,
  atlasPadding: 1,
  glyphCacheCapacity: 1024,
  tabWidth: 8,
  maxScrollStep: 5,
  debug: false,
});

/** Clamp a possibly missing number into [min, max], falling back when not finite. */
export function clampFiniteNumber(
  value: number | undefined,
  fallback: number,
  min: number,
  max: number,
  round = false,
): number {
  if (value === undefined || !Number.isFinite(value)) return fallback;
  const numeric = round ? Math.round(value) : value;
  return Math.min(max, Math.max(min, numeric));
}

function isPowerOfTwo(value: number): boolean {
  return value > 0 && (value & (value - 1)) === 0;
}

/** Merge partial options over the defaults, clamping every number. */
export function resolveTerminalConfig(options: TerminalConfigOptions = {}): TerminalConfig {
  const d = DEFAULT_TERMINAL_CONFIG;
  let atlasInitialSize = clampFiniteNumber(options.atlasInitialSize, d.atlasInitialSize, 16, 16384, true);
  if (!isPowerOfTwo(atlasInitialSize)) {
    atlasInitialSize = 2 ** Math.ceil(Math.log2(atlasInitialSize));
  }
  const atlasMaxSize = Math.max(
    atlasInitialSize,
    clampFiniteNumber(options.atlasMaxSize, d.atlasMaxSize, 16, 16384, true),
  );
  return {
    fontSize: clampFiniteNumber(options.fontSize, d.fontSize, 4, 256, true),
    cellWidth: clampFiniteNumber(options.cellWidth, d.cellWidth, 1, 512, true),
    cellHeight: clampFiniteNumber(options.cellHeight, d.cellHeight, 1, 512, true),
    atlasInitialSize,
    atlasMaxSize,
    atlasPadding: clampFiniteNumber(options.atlasPadding, d.atlasPadding, 0, 8, true),
    glyphCacheCapacity: clampFiniteNumber(
      options.glyphCacheCapacity,
      d.glyphCacheCapacity,
      1,
      1 << 20,
      true,
    ),
    tabWidth: clampFiniteNumber(options.tabWidth, d.tabWidth, 1, 64, true),
    maxScrollStep: clampFiniteNumber(options.maxScrollStep, d.maxScrollStep, 1, 1000, true),
    debug: options.debug ?? d.debug,
  };
}

/** Build the scoped logger for a module from resolved config. */
export function createScopedLogger(
  scope: string,
  config: Pick<TerminalConfig, "debug">,
  onLog?: (line: string) => void,
): Logger {
  return createConsoleLogger(scope, { debug: config.debug, onLog });
}
