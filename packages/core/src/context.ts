/**
 * Context chains: which named operations were active, over which byte
 * ranges, when a read failed.
 *
 * Frames hold offsets only. Two strategies exist and one is chosen when an
 * Input is created:
 *
 * - `FullContextChain` keeps every frame. The innermost frame is recorded
 *   first and each enclosing operation prepends its own as the error
 *   travels outward.
 * - `MinimalContextChain` keeps a single synthetic frame equal to the
 *   terminal failure. Pushing onto it is a no-op.
 *
 * Both expose the same reads, so callers never branch on the strategy.
 */

import type { Features } from "./config.js";
import type { Span } from "./span.js";

export interface ContextFrame {
  /** What was being attempted, e.g. `"read header"`. */
  readonly operation: string;
  /** Absolute byte range the operation was attempted over. */
  readonly span: Span;
}

export interface ContextChain {
  /** Number of frames `frames()` yields. */
  readonly depth: number;
  /**
   * Frames outermost first. Never empty: with no named operations the single
   * frame is the terminal failure itself.
   */
  frames(): IterableIterator<ContextFrame>;
  /** Span of the innermost frame. */
  innermostSpan(): Span;
  /** Span of the outermost frame. */
  outermostSpan(): Span;
  /** Operation names, outermost first. */
  operationNames(): string[];
  /** Chain with `frame` added as the new outermost frame. */
  push(frame: ContextFrame): ContextChain;
}

/** Starts a chain from the frame of the terminal failure. */
export type ContextStrategy = (terminal: ContextFrame) => ContextChain;

interface FrameNode {
  readonly frame: ContextFrame;
  readonly child: FrameNode | null;
}

export class FullContextChain implements ContextChain {
  private constructor(
    private readonly terminal: ContextFrame,
    private readonly head: FrameNode | null,
    private readonly pushed: number,
  ) {}

  static start(terminal: ContextFrame): ContextChain {
    return new FullContextChain(terminal, null, 0);
  }

  get depth(): number {
    return Math.max(1, this.pushed);
  }

  *frames(): IterableIterator<ContextFrame> {
    if (this.head === null) {
      yield this.terminal;
      return;
    }
    for (let node: FrameNode | null = this.head; node !== null; node = node.child) {
      yield node.frame;
    }
  }

  innermostSpan(): Span {
    let node = this.head;
    if (node === null) return this.terminal.span;
    while (node.child !== null) node = node.child;
    return node.frame.span;
  }

  outermostSpan(): Span {
    return this.head === null ? this.terminal.span : this.head.frame.span;
  }

  operationNames(): string[] {
    return Array.from(this.frames(), (f) => f.operation);
  }

  push(frame: ContextFrame): ContextChain {
    return new FullContextChain(this.terminal, { frame, child: this.head }, this.pushed + 1);
  }
}

export class MinimalContextChain implements ContextChain {
  readonly depth = 1;

  private constructor(private readonly terminal: ContextFrame) {}

  static start(terminal: ContextFrame): ContextChain {
    return new MinimalContextChain(terminal);
  }

  *frames(): IterableIterator<ContextFrame> {
    yield this.terminal;
  }

  innermostSpan(): Span {
    return this.terminal.span;
  }

  outermostSpan(): Span {
    return this.terminal.span;
  }

  operationNames(): string[] {
    return [this.terminal.operation];
  }

  push(_frame: ContextFrame): ContextChain {
    return this;
  }
}

export function contextStrategy(features: Features): ContextStrategy {
  return features.fullContext ? FullContextChain.start : MinimalContextChain.start;
}
