import { expect, test } from "vitest";
import { Parser, type ParserEvent } from "../src/parser";

const encoder = new TextEncoder();

function parse(...chunks: Array<string | number[]>): ParserEvent[] {
  const parser = new Parser();
  const events: ParserEvent[] = [];
  for (const chunk of chunks) {
    const bytes = typeof chunk === "string" ? encoder.encode(chunk) : Uint8Array.from(chunk);
    parser.advance(bytes, (event) => events.push(event));
  }
  return events;
}

function bytes(text: string): Uint8Array {
  return encoder.encode(text);
}

test("parser prints ASCII and executes C0 controls", () => {
  expect(parse("a\r\nb")).toEqual([
    { type: "print", char: "a" },
    { type: "execute", byte: 0x0d },
    { type: "execute", byte: 0x0a },
    { type: "print", char: "b" },
  ]);
});

test("parser drops DEL in ground state", () => {
  expect(parse([0x41, 0x7f, 0x42])).toEqual([
    { type: "print", char: "A" },
    { type: "print", char: "B" },
  ]);
});

test("parser collects CSI parameters", () => {
  expect(parse("\x1b[12;5H")).toEqual([
    { type: "csi", params: [12, 5], intermediates: "", final: "H", ignore: false },
  ]);
});

test("parser reads empty CSI parameters as zero", () => {
  expect(parse("\x1b[;5H")).toEqual([
    { type: "csi", params: [0, 5], intermediates: "", final: "H", ignore: false },
  ]);
  expect(parse("\x1b[H")).toEqual([
    { type: "csi", params: [], intermediates: "", final: "H", ignore: false },
  ]);
});

test("parser keeps private markers in intermediates", () => {
  expect(parse("\x1b[?25h")).toEqual([
    { type: "csi", params: [25], intermediates: "?", final: "h", ignore: false },
  ]);
});

test("parser flags colon sub-parameters as ignored", () => {
  expect(parse("\x1b[1:2m")).toEqual([
    { type: "csi", params: [1], intermediates: "", final: "m", ignore: true },
  ]);
});

test("parser saturates oversized parameters", () => {
  expect(parse("\x1b[999999C")).toEqual([
    { type: "csi", params: [0xffff], intermediates: "", final: "C", ignore: false },
  ]);
});

test("parser executes C0 bytes inside a CSI sequence", () => {
  expect(parse("\x1b[1\nA")).toEqual([
    { type: "execute", byte: 0x0a },
    { type: "csi", params: [1], intermediates: "", final: "A", ignore: false },
  ]);
});

test("parser CAN aborts a sequence", () => {
  expect(parse("\x1b[12\x18A")).toEqual([
    { type: "execute", byte: 0x18 },
    { type: "print", char: "A" },
  ]);
});

test("parser dispatches ESC sequences with intermediates", () => {
  expect(parse("\x1b(B\x1b7")).toEqual([
    { type: "esc", intermediates: "(", final: "B", ignore: false },
    { type: "esc", intermediates: "", final: "7", ignore: false },
  ]);
});

test("parser splits BEL-terminated OSC payloads at semicolons", () => {
  expect(parse("\x1b]0;hi;there\x07x")).toEqual([
    { type: "osc", params: [bytes("0"), bytes("hi"), bytes("there")], bellTerminated: true },
    { type: "print", char: "x" },
  ]);
});

test("parser ends OSC on ST and reports the ST escape", () => {
  expect(parse("\x1b]2;t\x1b\\")).toEqual([
    { type: "osc", params: [bytes("2"), bytes("t")], bellTerminated: false },
    { type: "esc", intermediates: "", final: "\\", ignore: false },
  ]);
});

test("parser truncates long OSC payloads but still dispatches", () => {
  const events = parse(`\x1b]9;${"x".repeat(5000)}\x07`);
  expect(events.length).toBe(1);
  const event = events[0];
  if (event.type !== "osc") throw new Error(`expected osc, got ${event.type}`);
  expect(event.params.length).toBe(2);
  // 4096 bytes kept: "9;" plus 4094 payload bytes
  expect(event.params[1].length).toBe(4094);
});

test("parser hooks, passes through and unhooks DCS strings", () => {
  expect(parse("\x1bP1$qm\x1b\\")).toEqual([
    { type: "dcs-hook", params: [1], intermediates: "$", final: "q", ignore: false },
    { type: "dcs-put", byte: 0x6d },
    { type: "dcs-unhook" },
    { type: "esc", intermediates: "", final: "\\", ignore: false },
  ]);
});

test("parser swallows SOS/PM/APC strings", () => {
  expect(parse("\x1b_payload\x1b\\z")).toEqual([
    { type: "esc", intermediates: "", final: "\\", ignore: false },
    { type: "print", char: "z" },
  ]);
});

test("parser decodes multi-byte UTF-8", () => {
  expect(parse("é€😀")).toEqual([
    { type: "print", char: "é" },
    { type: "print", char: "€" },
    { type: "print", char: "😀" },
  ]);
});

test("parser decodes UTF-8 split across chunks into one character", () => {
  const euro = Array.from(bytes("€"));
  expect(parse(euro.slice(0, 1), euro.slice(1, 2), euro.slice(2))).toEqual([
    { type: "print", char: "€" },
  ]);
});

test("parser replaces invalid UTF-8 and keeps the following byte", () => {
  expect(parse([0xc3, 0x41])).toEqual([
    { type: "print", char: "�" },
    { type: "print", char: "A" },
  ]);
  expect(parse([0xff, 0x42])).toEqual([
    { type: "print", char: "�" },
    { type: "print", char: "B" },
  ]);
});

test("parser emits identical events for every chunking", () => {
  const input = bytes("ab\x1b[31mé\x1b]0;t\x07\x1bP$q\x1b\\\x1b[2J€z");
  const whole = parse(Array.from(input));

  for (let split = 0; split <= input.length; split += 1) {
    expect(parse(Array.from(input.subarray(0, split)), Array.from(input.subarray(split)))).toEqual(
      whole,
    );
  }
  const byteAtATime = parse(...Array.from(input, (byte) => [byte]));
  expect(byteAtATime).toEqual(whole);
});

test("parser returns to ground after a complete sequence", () => {
  const parser = new Parser();
  parser.advance(bytes("\x1b["), () => {});
  expect(parser.currentState).toBe("csi-entry");
  parser.advance(bytes("0m"), () => {});
  expect(parser.currentState).toBe("ground");
});
