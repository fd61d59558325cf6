import type { Annotation, TraceValue } from "@linelens/contracts";
import type { ValueFormatter } from "./format.js";

export interface LineEventPayload {
  offset: number;
  value: TraceValue;
}

export interface LineResolution {
  lineIndex: number;
  lineStep: number;
}

export class LineEvent {
  private cachedAnnotation: Annotation | null = null;
  private cachedPlaceholder: Annotation | null = null;

  constructor(
    readonly arrivalIndex: number,
    readonly fileIndex: number,
    readonly lineIndex: number,
    readonly payload: Readonly<LineEventPayload>,
  ) {}

  get offset(): number {
    return this.payload.offset;
  }

  annotation(formatter: ValueFormatter): Annotation {
    if (!this.cachedAnnotation) {
      this.cachedAnnotation = { offset: this.payload.offset, text: formatter.brief(this.payload.value) };
    }
    return this.cachedAnnotation;
  }

  // Shown on a line whose events all arrived after the cursor.
  placeholder(text: string): Annotation {
    if (!this.cachedPlaceholder || this.cachedPlaceholder.text !== text) {
      this.cachedPlaceholder = { offset: this.payload.offset, text };
    }
    return this.cachedPlaceholder;
  }
}

/**
 * Rightmost position whose arrival index is <= target, or -1.
 * Slots are ordered by arrival index, so this is a plain binary search.
 */
export function rightmostAtOrBefore(events: readonly LineEvent[], target: number): number {
  let lo = 0;
  let hi = events.length;
  while (lo < hi) {
    const mid = (lo + hi) >>> 1;
    const event = events[mid];
    if (event && event.arrivalIndex <= target) {
      lo = mid + 1;
    } else {
      hi = mid;
    }
  }
  return lo - 1;
}

export class FileEvents {
  readonly lines: LineEvent[][];
  readonly entries: (Annotation | null)[];
  readonly shownSteps: number[];

  constructor(lineCount: number) {
    this.lines = Array.from({ length: lineCount }, () => []);
    this.entries = Array.from({ length: lineCount }, () => null);
    this.shownSteps = Array.from({ length: lineCount }, () => -1);
  }

  get lineCount(): number {
    return this.lines.length;
  }

  append(event: LineEvent): void {
    const slot = this.lines[event.lineIndex];
    if (!slot) return;
    slot.push(event);
  }

  resolve(arrivalIndex: number, formatter: ValueFormatter, placeholderText: string): LineResolution | null {
    let selected: LineResolution | null = null;
    for (const [lineIndex, slot] of this.lines.entries()) {
      const step = rightmostAtOrBefore(slot, arrivalIndex);
      const event = step >= 0 ? slot[step] : undefined;
      if (event) {
        this.entries[lineIndex] = event.annotation(formatter);
        if (event.arrivalIndex === arrivalIndex) {
          selected = { lineIndex, lineStep: step };
        }
      } else {
        const first = slot[0];
        this.entries[lineIndex] = first ? first.placeholder(placeholderText) : null;
      }
      this.shownSteps[lineIndex] = step;
    }
    return selected;
  }
}
