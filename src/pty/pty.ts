import { silentLogger, type Logger } from "../logger";
import type {
  PtyCallbacks,
  PtyConnectionState,
  PtyConnectOptions,
  PtyLifecycleState,
  PtyTransport,
  StreamPtySource,
} from "./types";

const textEncoder = new TextEncoder();

/** Normalize a stream chunk into bytes. */
export function toPtyBytes(chunk: unknown): Uint8Array | null {
  if (chunk instanceof Uint8Array) return chunk;
  if (typeof chunk === "string") return textEncoder.encode(chunk);
  if (chunk instanceof ArrayBuffer) return new Uint8Array(chunk);
  return null;
}

/** Create a fresh idle PTY connection state. */
export function createPtyConnection(): PtyConnectionState {
  return {
    status: "idle",
    connectId: 0,
    detach: null,
  };
}

function setConnectionStatus(state: PtyConnectionState, status: PtyLifecycleState): void {
  state.status = status;
}

/**
 * Attach to the source's output stream. Returns false if a connection is
 * already active.
 */
export function connectPty(
  state: PtyConnectionState,
  source: StreamPtySource,
  options: Pick<PtyConnectOptions, "cols" | "rows">,
  callbacks: PtyCallbacks,
  logger: Logger = silentLogger,
): boolean {
  if (state.status === "connected" || state.status === "closing") {
    return false;
  }

  const connectId = state.connectId + 1;
  state.connectId = connectId;
  const { output, input } = source;

  let disconnectedNotified = false;
  const notifyDisconnected = () => {
    if (disconnectedNotified) return;
    disconnectedNotified = true;
    callbacks.onDisconnect?.();
  };

  const onData = (chunk: unknown) => {
    if (state.connectId !== connectId) return;
    const bytes = toPtyBytes(chunk);
    if (!bytes) {
      logger.warn(`dropped chunk of unexpected type ${typeof chunk}`);
      return;
    }
    if (bytes.length) callbacks.onData?.(bytes);
  };

  const onEnd = () => {
    if (state.connectId !== connectId) return;
    const code = source.getExitCode?.() ?? 0;
    detach();
    setConnectionStatus(state, "idle");
    logger.info(`output ended (exit ${code})`);
    callbacks.onExit?.(code);
    notifyDisconnected();
  };

  const failWith = (action: string) => (err: unknown) => {
    if (state.connectId !== connectId) return;
    const message = err instanceof Error ? err.message : String(err);
    logger.error(`${action} failed: ${message}`);
    callbacks.onError?.(message, err);
    detach();
    setConnectionStatus(state, "idle");
    notifyDisconnected();
  };
  const onReadError = failWith("read");
  const onWriteError = failWith("write");

  const lateError = (err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    logger.debug(`stream error after disconnect: ${message}`);
  };

  const detach = () => {
    output.off("data", onData);
    output.off("end", onEnd);
    output.off("error", onReadError);
    input.off("error", onWriteError);
    if (output.listenerCount("error") === 0) output.on("error", lateError);
    if (input.listenerCount("error") === 0) input.on("error", lateError);
    if (state.detach === detach) state.detach = null;
  };

  output.on("data", onData);
  output.once("end", onEnd);
  output.on("error", onReadError);
  input.on("error", onWriteError);
  state.detach = () => {
    detach();
    notifyDisconnected();
  };
  setConnectionStatus(state, "connected");
  callbacks.onConnect?.();

  if (Number.isFinite(options.cols) && Number.isFinite(options.rows)) {
    sendPtyResize(state, source, Number(options.cols), Number(options.rows));
  }
  return true;
}

/** Detach from the source and reset state to idle. */
export function disconnectPty(state: PtyConnectionState): void {
  if (state.status === "idle") return;
  setConnectionStatus(state, "closing");
  const detach = state.detach;
  state.detach = null;
  state.connectId += 1;
  detach?.();
  setConnectionStatus(state, "idle");
}

/** Write keyboard bytes to the source. Returns false when not connected. */
export function sendPtyInput(
  state: PtyConnectionState,
  source: StreamPtySource,
  data: Uint8Array | string,
): boolean {
  const { input } = source;
  if (state.status !== "connected" || input.writableEnded || input.destroyed) return false;
  input.write(typeof data === "string" ? textEncoder.encode(data) : data);
  return true;
}

/** Forward a window size to the source. Returns false when it cannot be applied. */
export function sendPtyResize(
  state: PtyConnectionState,
  source: StreamPtySource,
  cols: number,
  rows: number,
): boolean {
  if (state.status !== "connected" || !source.resize) return false;
  source.resize(Math.max(1, Math.floor(cols)), Math.max(1, Math.floor(rows)));
  return true;
}

export function isPtyConnected(state: PtyConnectionState): boolean {
  return state.status === "connected";
}

/**
 * Create a PtyTransport over a readable/writable pair. There is no
 * backpressure: every chunk the source emits is handed to `onData`.
 */
export function createStreamPtyTransport(
  source: StreamPtySource,
  logger: Logger = silentLogger,
  state: PtyConnectionState = createPtyConnection(),
): PtyTransport {
  return {
    connect: (options: PtyConnectOptions) => {
      const connected = connectPty(state, source, options, options.callbacks, logger);
      if (!connected) {
        throw new Error(`PTY connection is busy (${state.status})`);
      }
    },
    disconnect: () => {
      disconnectPty(state);
    },
    sendInput: (data) => {
      return sendPtyInput(state, source, data);
    },
    resize: (cols: number, rows: number) => {
      return sendPtyResize(state, source, cols, rows);
    },
    isConnected: () => {
      return isPtyConnected(state);
    },
    destroy: () => {
      disconnectPty(state);
      source.input.end();
    },
  };
}
