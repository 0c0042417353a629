/**
 * Table Harvest: Cell Content Resolver
 *
 * Report cells often wrap their value in markup (`<td><div>30</div><div>thirty</div></td>`).
 * The text of the first "meaningful" nested element wins; the whole-cell text
 * is the fallback. Both are fed from the same event stream, as two independent
 * accumulators.
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

/** Tags whose text is preferred over the raw text of the cell */
export const MEANINGFUL_TAGS: ReadonlySet<string> = new Set([
  "div",
  "span",
  "a",
  "p",
  "strong",
  "em",
  "b",
  "i",
]);

export type CellKind = "header" | "data";

export class CellContext {
  readonly kind: CellKind;

  private readonly openTags: string[] = [];
  private raw = "";
  private capture = "";
  /** Stack index of the element that owns the active capture, -1 when none */
  private captureOwner = -1;
  private firstCapture: string | null = null;

  constructor(kind: CellKind) {
    this.kind = kind;
  }

  get captured(): string | null {
    return this.firstCapture;
  }

  openTag(name: string): void {
    if (!MEANINGFUL_TAGS.has(name)) return;

    this.openTags.push(name);
    if (this.firstCapture === null && this.captureOwner === -1) {
      this.captureOwner = this.openTags.length - 1;
      this.capture = "";
    }
  }

  closeTag(name: string): void {
    if (!MEANINGFUL_TAGS.has(name)) return;
    if (this.openTags[this.openTags.length - 1] !== name) return;

    this.openTags.pop();
    if (this.captureOwner === this.openTags.length) {
      this.finishCapture();
    }
  }

  appendText(text: string): void {
    this.raw += text;
    if (this.captureOwner !== -1) {
      this.capture += text;
    }
  }

  /**
   * Final cell value: the first non-blank nested capture, else the trimmed
   * raw text. Always a string.
   */
  resolve(): string {
    if (this.captureOwner !== -1) {
      this.finishCapture();
    }
    return this.firstCapture ?? this.raw.trim();
  }

  private finishCapture(): void {
    const text = this.capture.trim();
    this.captureOwner = -1;
    this.capture = "";
    // A blank element does not count; a later sibling may still capture
    if (text) {
      this.firstCapture = text;
    }
  }
}
