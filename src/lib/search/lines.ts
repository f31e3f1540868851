/**
 * Yields the lines of `contents` in document order.
 *
 * Lines are separated by `\n`; a `\r` directly before the `\n` is part of the
 * terminator. A trailing terminator does not start an extra empty line, so
 * `"a\nb\n"` and `"a\nb"` both yield `["a", "b"]` and `""` yields nothing.
 */
export function* splitLines(contents: string): Generator<string, void> {
  let start = 0;
  while (start < contents.length) {
    const newline = contents.indexOf('\n', start);
    if (newline === -1) {
      yield contents.slice(start);
      return;
    }

    const end =
      newline > start && contents.charCodeAt(newline - 1) === 0x0d
        ? newline - 1
        : newline;
    yield contents.slice(start, end);
    start = newline + 1;
  }
}
