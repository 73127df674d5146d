import { expect, test } from "vitest";
import {
  applyWheelScroll,
  createInputHandler,
  encodeKey,
  wheelDeltaToRows,
} from "../src/input";

function keyBytes(key: string): number[] | null {
  const bytes = encodeKey(key);
  return bytes ? Array.from(bytes) : null;
}

test("keymap encodes named keys", () => {
  expect(keyBytes("Backspace")).toEqual([0x08]);
  expect(keyBytes("Enter")).toEqual([0x0d]);
  expect(keyBytes("Space")).toEqual([0x20]);
  expect(keyBytes("Tab")).toEqual([0x09]);
  expect(keyBytes("Escape")).toEqual([0x1b]);
  expect(keyBytes("ArrowUp")).toEqual([0x1b, 0x5b, 0x41]);
  expect(keyBytes("ArrowDown")).toEqual([0x1b, 0x5b, 0x42]);
  expect(keyBytes("ArrowRight")).toEqual([0x1b, 0x5b, 0x43]);
  expect(keyBytes("ArrowLeft")).toEqual([0x1b, 0x5b, 0x44]);
});

test("keymap sends printable text as UTF-8", () => {
  expect(keyBytes("a")).toEqual([0x61]);
  expect(keyBytes("A")).toEqual([0x41]);
  expect(keyBytes("ü")).toEqual([0xc3, 0xbc]);
  expect(keyBytes("hi")).toEqual([0x68, 0x69]);
});

test("keymap has no encoding for other named keys", () => {
  expect(encodeKey("Shift")).toBeNull();
  expect(encodeKey("F5")).toBeNull();
  expect(encodeKey("")).toBeNull();
});

test("wheel deltas are truncated and clamped", () => {
  expect(wheelDeltaToRows(2.9)).toBe(2);
  expect(wheelDeltaToRows(-2.9)).toBe(-2);
  expect(wheelDeltaToRows(12)).toBe(5);
  expect(wheelDeltaToRows(-12)).toBe(-5);
  expect(wheelDeltaToRows(-0.5)).toBe(0);
  expect(wheelDeltaToRows(Number.NaN)).toBe(0);
  expect(wheelDeltaToRows(12, 3)).toBe(3);
});

test("positive wheel deltas scroll the target backwards", () => {
  const moves: number[] = [];
  const target = { scroll: (delta: number) => moves.push(delta) };
  expect(applyWheelScroll(target, 3)).toBe(3);
  expect(applyWheelScroll(target, -8)).toBe(-5);
  expect(applyWheelScroll(target, 0.2)).toBe(0);
  expect(moves).toEqual([-3, 5]);
});

test("input handler sends encoded keys and text", () => {
  const sent: number[][] = [];
  const handler = createInputHandler({ sendInput: (data) => sent.push(Array.from(data)) });
  expect(handler.handleKey("Enter")).toBe(true);
  expect(handler.handleKey("Control")).toBe(false);
  handler.handleText("");
  handler.handleText("ok");
  expect(sent).toEqual([[0x0d], [0x6f, 0x6b]]);
  expect(handler.handleWheel(3)).toBe(0);
});

test("input handler wheel honors the configured step", () => {
  const moves: number[] = [];
  const handler = createInputHandler({
    sendInput: () => {},
    scrollTarget: { scroll: (delta) => moves.push(delta) },
    maxScrollStep: 2,
  });
  expect(handler.handleWheel(9)).toBe(2);
  expect(moves).toEqual([-2]);
});
