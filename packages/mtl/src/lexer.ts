import { ParsingError } from "./errors.js";

/** The lines of one `GROUP` / `END_GROUP` span, opening `GROUP` included. */
export type RawGroup = string[];

const START_GROUP = /^GROUP\s=\s(?<tag>.+)/;
const END_GROUP = /^END_GROUP\s=\s(?<tag>.+)/;
const EOF = "END";

interface OpenGroup {
  tag: string;
  lines: RawGroup;
}

/**
 * Group a sequence of trimmed lines into raw groups.
 *
 * Groups are tracked on a stack so nested groups close independently of
 * their parents. A group is yielded when its `END_GROUP` line is reached,
 * so groups come out in close order. A bare `END` line stops lexing and any
 * group still open at that point is discarded.
 *
 * @throws {ParsingError} when an `END_GROUP` tag differs from the tag of the
 * innermost open group, when `END_GROUP` appears with no group open, or when
 * a non-blank line appears outside any group.
 */
export function* lexer(lines: Iterable<string>): Generator<RawGroup> {
  const stack: OpenGroup[] = [];

  for (const line of lines) {
    const start = START_GROUP.exec(line);
    if (start?.groups) {
      stack.push({ tag: start.groups.tag ?? "", lines: [line] });
      continue;
    }

    const end = END_GROUP.exec(line);
    if (end?.groups) {
      const endTag = end.groups.tag ?? "";
      const current = stack.pop();
      if (current === undefined) {
        throw new ParsingError(`END_GROUP = ${endTag} without an open group`);
      }
      if (current.tag !== endTag) {
        throw new ParsingError(
          `Diverging start and end tag: ${current.tag} != ${endTag}`,
        );
      }
      yield current.lines;
      continue;
    }

    if (line === EOF) {
      return;
    }

    const top = stack[stack.length - 1];
    if (top !== undefined) {
      top.lines.push(line);
    } else if (line !== "") {
      throw new ParsingError(`Unexpected line outside of any group: ${line}`);
    }
  }
}
