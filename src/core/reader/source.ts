// src/core/reader/source.ts
// Comment handling: a ';' starts a comment running to the end of the line

/**
 * Remove every comment together with its line terminator.
 * Tokens on either side of a removed comment end up adjacent.
 */
export function stripComments(src: string): string {
  let out = "";
  let i = 0;
  while (i < src.length) {
    const c = src.charAt(i);
    if (c === ";") {
      while (i < src.length && src[i] !== "\n") i++;
      if (i < src.length) i++;
      continue;
    }
    out += c;
    i++;
  }
  return out;
}

/**
 * Replace comment characters with spaces, keeping newlines,
 * so offsets into the result are offsets into the input.
 */
export function blankComments(src: string): string {
  let out = "";
  let inComment = false;
  // one output unit per UTF-16 unit, the unit spans are counted in
  for (let i = 0; i < src.length; i++) {
    const c = src.charAt(i);
    if (c === "\n") inComment = false;
    else if (c === ";") inComment = true;
    out += inComment ? " " : c;
  }
  return out;
}
