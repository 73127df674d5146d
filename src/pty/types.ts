import type { Readable, Writable } from "node:stream";

/**
 * PTY connection lifecycle phase.
 * - idle: no active connection
 * - connected: session is live
 * - closing: teardown in progress
 */
export type PtyLifecycleState = "idle" | "connected" | "closing";

/**
 * Event callbacks for PTY connection lifecycle and data flow.
 */
export type PtyCallbacks = {
  /** Called when the byte source is attached. */
  onConnect?: () => void;
  /** Called when the connection is closed or lost. */
  onDisconnect?: () => void;
  /** Called with each chunk of raw output from the child process. */
  onData?: (data: Uint8Array) => void;
  /** Called when reading from or writing to the source fails. */
  onError?: (message: string, error?: unknown) => void;
  /** Called with the exit code when the output stream ends. */
  onExit?: (code: number) => void;
};

/**
 * Options for establishing a PTY connection.
 */
export type PtyConnectOptions = {
  /** Initial terminal width in columns. */
  cols?: number;
  /** Initial terminal height in rows. */
  rows?: number;
  /** Event callbacks for connection lifecycle and data. */
  callbacks: PtyCallbacks;
};

/**
 * Transport abstraction over the child process's pseudo-terminal.
 */
export type PtyTransport = {
  /** Start delivering output through the callbacks. */
  connect: (options: PtyConnectOptions) => void | Promise<void>;
  /** Stop delivering output. */
  disconnect: () => void;
  /** Send keyboard bytes; returns true if the data was written. */
  sendInput: (data: Uint8Array | string) => boolean;
  /** Notify the PTY of a terminal resize; returns true if it was applied. */
  resize: (cols: number, rows: number) => boolean;
  /** Whether the transport currently has an active connection. */
  isConnected: () => boolean;
  /** Release all resources held by the transport. */
  destroy?: () => void | Promise<void>;
};

/**
 * Stream pair a pseudo-terminal exposes, e.g. a pty library's process
 * handle or a child process's stdio.
 */
export type StreamPtySource = {
  /** Bytes produced by the child process. */
  output: Readable;
  /** Bytes for the child process's input. */
  input: Writable;
  /** Apply a new window size to the pseudo-terminal. */
  resize?: (cols: number, rows: number) => void;
  /** Exit code reported once `output` ends; defaults to 0. */
  getExitCode?: () => number | null;
};

/**
 * Internal state of a stream PTY connection.
 */
export type PtyConnectionState = {
  status: PtyLifecycleState;
  /** Monotonic ID used to discard callbacks from a stale connection. */
  connectId: number;
  /** Detaches the listeners of the active connection. */
  detach: (() => void) | null;
};
