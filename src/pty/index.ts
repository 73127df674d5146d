export {
  connectPty,
  createPtyConnection,
  createStreamPtyTransport,
  disconnectPty,
  isPtyConnected,
  sendPtyInput,
  sendPtyResize,
  toPtyBytes,
} from "./pty";
export type {
  PtyCallbacks,
  PtyConnectionState,
  PtyConnectOptions,
  PtyLifecycleState,
  PtyTransport,
  StreamPtySource,
} from "./types";
