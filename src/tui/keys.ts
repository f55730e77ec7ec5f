import type { Readable } from "node:stream";
import { Answer } from "../domain/answer.js";

export type KeyAction =
  | { kind: "answer"; answer: Answer }
  | { kind: "erase" }
  | { kind: "abort" };

const CTRL_C = "\x03";
const ERASE_KEYS: ReadonlySet<string> = new Set(["\x08", "\x7f"]);
const ENTERABLE: ReadonlySet<string> = new Set<string>([
  Answer.CORRECT,
  Answer.WRONG,
  Answer.EMPTY,
]);

function isEnterable(ch: string): ch is Answer {
  return ENTERABLE.has(ch);
}

/** Map one raw key to an action; unknown keys (space included) yield null. */
export function parseKey(raw: string): KeyAction | null {
  if (raw === CTRL_C) return { kind: "abort" };
  if (ERASE_KEYS.has(raw)) return { kind: "erase" };
  const ch: string = raw.toUpperCase();
  return isEnterable(ch) ? { kind: "answer", answer: ch } : null;
}

// CSI (`ESC [ ... final`), SS3 (`ESC O x`) and two-byte escapes such as
// arrow and function keys, plus a lone ESC.
const ESCAPE_SEQUENCE = /\x1b(?:\[[0-?]*[ -\/]*[@-~]|O[\s\S]|[\s\S])?/g;

export function stripEscapes(chunk: string): string {
  return chunk.replace(ESCAPE_SEQUENCE, "");
}

export type KeyStream = Readable & {
  isTTY?: boolean;
  isRaw?: boolean;
  setRawMode?: (mode: boolean) => unknown;
};

/**
 * Single characters from a TTY in raw mode, with terminal escape sequences
 * dropped. The previous mode is restored and the stream paused once the
 * consumer stops iterating.
 */
export async function* readKeys(
  stdin: KeyStream
): AsyncGenerator<string, void, undefined> {
  const wasRaw: boolean = stdin.isRaw === true;
  if (stdin.isTTY && stdin.setRawMode) stdin.setRawMode(true);
  stdin.setEncoding("utf8");
  try {
    for await (const chunk of stdin) {
      for (const ch of stripEscapes(String(chunk))) yield ch;
    }
  } finally {
    if (stdin.isTTY && stdin.setRawMode) stdin.setRawMode(wasRaw);
    stdin.pause();
  }
}
