import { AltTreeError } from "../utils/errors";
import type { Alternate, Branch, Transcript, TranscriptEntry } from "../utils/transcription";

/**
 * One nesting level. Frame 0 is the transcript itself and has a single
 * branch; every other frame is an alternate being read, its parent being the
 * frame just below it on the stack.
 */
type AltFrame = {
  branches: Branch[];
};

/**
 * Tracks nested `{ ... / ... }` scopes while a line is scanned.
 *
 * Entries always go to the last branch of the top frame. A closed alternate is
 * appended to the enclosing frame's current branch, so an alternate closed at
 * depth one lands in the transcript as a single entry. Scopes still open when
 * the line ends are dropped along with everything they hold.
 */
export class AltTreeBuilder {
  private readonly frames: AltFrame[] = [{ branches: [[]] }];
  private closed = 0;

  /** Number of open alternate scopes. */
  get depth(): number {
    return this.frames.length - 1;
  }

  get isOpen(): boolean {
    return this.depth > 0;
  }

  /** Alternates closed so far, at any depth. */
  get closedCount(): number {
    return this.closed;
  }

  private get top(): AltFrame {
    return this.frames[this.frames.length - 1];
  }

  private get currentBranch(): Branch {
    const { branches } = this.top;
    return branches[branches.length - 1];
  }

  push(entry: TranscriptEntry): void {
    this.currentBranch.push(entry);
  }

  openScope(): void {
    this.frames.push({ branches: [[]] });
  }

  startNewBranch(): void {
    if (!this.isOpen) {
      throw new AltTreeError("Branch separator outside of an alternate", "NO_OPEN_SCOPE");
    }
    this.top.branches.push([]);
  }

  /**
   * Close the innermost scope. Fails when its current (last) branch is empty,
   * which covers `{}`, `{ / }` and a trailing `{ a / }`.
   */
  closeScope(): Alternate {
    if (!this.isOpen) {
      throw new AltTreeError("Closing brace outside of an alternate", "NO_OPEN_SCOPE");
    }
    if (this.currentBranch.length === 0) {
      throw new AltTreeError('Empty alternate found ("{ }")', "EMPTY_ALTERNATE");
    }
    const alternate: Alternate = { kind: "alternate", branches: this.top.branches };
    this.frames.pop();
    this.push(alternate);
    this.closed++;
    return alternate;
  }

  /**
   * The finished transcript. Unterminated scopes are discarded.
   */
  finish(): Transcript {
    this.frames.length = 1;
    return this.frames[0].branches[0];
  }
}
