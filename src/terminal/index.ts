export { ChunkQueue } from "./chunk-queue";
export { TerminalSession, type TerminalSessionOptions } from "./session";
export { Terminal, type TerminalOptions } from "./terminal";
