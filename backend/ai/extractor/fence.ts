export type FenceState = "outside-fence" | "inside-fence-with-tag" | "inside-fence-plain";

export interface FenceExtraction {
  content: string;
  /** State the scanner was in when it stopped. */
  state: FenceState;
  tag?: string;
  /** False when the text had no fence, or the last block was never closed. */
  closed: boolean;
}

const FENCE = /`{3,}/g;
const TAG = /^[A-Za-z][\w+-]*/;

/**
 * Language tag directly after a fence. An opening fence takes a tag followed
 * by whitespace, `{`, `[` or the end of input; a fence seen inside a block
 * only counts as a nested opener when its tag ends the line.
 */
function readTag(text: string, at: number, nested: boolean): string | undefined {
  const m = TAG.exec(text.slice(at));
  if (!m) return undefined;
  const rest = text.slice(at + m[0].length);
  if (nested) return /^[ \t]*(\r?\n|$)/.test(rest) ? m[0] : undefined;
  return /^(\s|\{|\[|$)/.test(rest) ? m[0] : undefined;
}

/**
 * Pull the content out of a markdown code fence. Without a fence the whole
 * trimmed text is returned. Nested openers narrow to the innermost block;
 * an unclosed block runs to the end of the input.
 */
export function extractFenced(raw: string): FenceExtraction {
  const text = raw.trim();
  const fence = new RegExp(FENCE.source, "g");

  let state: FenceState = "outside-fence";
  let tag: string | undefined;
  let contentStart = 0;

  for (let m = fence.exec(text); m !== null; m = fence.exec(text)) {
    const end = m.index + m[0].length;
    const inside = state !== "outside-fence";
    const nextTag = readTag(text, end, inside);
    const pending = text.slice(contentStart, m.index);

    // Opening fence: from outside, a tagged nested opener, or a fence right
    // after an opener with nothing between them.
    if (!inside || nextTag !== undefined || pending.trim() === "") {
      state = nextTag !== undefined ? "inside-fence-with-tag" : "inside-fence-plain";
      tag = nextTag;
      contentStart = end + (nextTag?.length ?? 0);
      fence.lastIndex = contentStart;
      continue;
    }

    return { content: pending.trim(), state, tag, closed: true };
  }

  if (state === "outside-fence") return { content: text, state, closed: false };
  return { content: text.slice(contentStart).trim(), state, tag, closed: false };
}
