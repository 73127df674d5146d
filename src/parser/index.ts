export { Parser } from "./parser";
export { Utf8Decoder, REPLACEMENT_CHAR, UTF8_PENDING, UTF8_REPROCESS } from "./utf8";
export type {
  ParserEvent,
  ParserEventSink,
  ParserState,
  PrintEvent,
  ExecuteEvent,
  CsiEvent,
  EscEvent,
  OscEvent,
  DcsHookEvent,
  DcsPutEvent,
  DcsUnhookEvent,
} from "./types";
