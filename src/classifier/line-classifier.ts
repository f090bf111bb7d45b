import {
  LineKind,
  type Classification,
  type CommentPair,
  type CommentSyntax,
  type ScannerState,
} from "./types.js";

export const CLOSED: ScannerState = { kind: "closed" };

export function openState(pair: CommentPair): ScannerState {
  return { kind: "open", pair };
}

/**
 * Classify one line given the scanner state left by the previous line.
 * Blank lines are recognized first, so they never change the state.
 */
export function classifyLine(
  line: string,
  state: ScannerState,
  syntax: CommentSyntax,
): Classification {
  const trimmed = line.trimStart();
  if (trimmed.trimEnd().length === 0) {
    return { kind: LineKind.Blank, state };
  }

  if (state.kind === "open") {
    const closes = trimmed.includes(state.pair.end);
    return { kind: LineKind.Comment, state: closes ? CLOSED : state };
  }

  for (const pair of syntax.pairs) {
    const startIndex = trimmed.indexOf(pair.start);
    if (startIndex === -1) {
      continue;
    }
    const rest = trimmed.slice(startIndex + pair.start.length);
    if (rest.includes(pair.end)) {
      return { kind: LineKind.Comment, state: CLOSED };
    }
    return { kind: LineKind.Comment, state: openState(pair) };
  }

  for (const prefix of syntax.prefixes) {
    if (trimmed.startsWith(prefix)) {
      return { kind: LineKind.Comment, state: CLOSED };
    }
  }

  return { kind: LineKind.Code, state: CLOSED };
}

export class LineScanner {
  private current: ScannerState = CLOSED;

  constructor(private readonly syntax: CommentSyntax) {}

  get state(): ScannerState {
    return this.current;
  }

  classify(line: string): LineKind {
    const result = classifyLine(line, this.current, this.syntax);
    this.current = result.state;
    return result.kind;
  }

  reset(): void {
    this.current = CLOSED;
  }
}
