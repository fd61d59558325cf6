import type {
  Annotation,
  FileDescriptor,
  LineStepMode,
  SelectionMove,
  SelectionSnapshot,
} from "@linelens/contracts";
import { IndexError } from "./errors.js";
import type { ValueFormatter } from "./format.js";
import { FileEvents, LineEvent, rightmostAtOrBefore, type LineEventPayload } from "./lineEvents.js";
import { isNonNegativeInt } from "./utils.js";

export interface TraceIndexOptions {
  formatter: ValueFormatter;
  placeholder: string;
  caseInsensitive: boolean;
}

export interface EventLocation {
  fileIndex: number;
  lineIndex: number;
  lineStep: number;
}

export interface FileResolution {
  fileIndex: number;
  entries: (Annotation | null)[];
  shownSteps: number[];
  selected: EventLocation | null;
}

interface Selection {
  arrivalIndex: number;
  fileIndex: number;
  lineIndex: number;
  lineStep: number;
  edited: boolean;
  resolved: boolean;
}

function emptySelection(): Selection {
  return { arrivalIndex: -1, fileIndex: 0, lineIndex: 0, lineStep: 0, edited: false, resolved: false };
}

export class TraceIndex {
  private readonly options: TraceIndexOptions;
  private filesByName = new Map<string, number>();
  private descriptors: FileDescriptor[] = [];
  private files: FileEvents[] = [];
  private lastArrival = -1;
  private selection: Selection = emptySelection();

  constructor(options: TraceIndexOptions) {
    this.options = options;
  }

  get lastArrivalIndex(): number {
    return this.lastArrival;
  }

  get fileCount(): number {
    return this.files.length;
  }

  private nameKey(filename: string): string {
    return this.options.caseInsensitive ? filename.toLowerCase() : filename;
  }

  fileIndexOf(filename: string): number | undefined {
    return this.filesByName.get(this.nameKey(filename));
  }

  descriptor(fileIndex: number): FileDescriptor | undefined {
    return this.descriptors[fileIndex];
  }

  lineEvents(fileIndex: number, lineIndex: number): readonly LineEvent[] {
    return this.files[fileIndex]?.lines[lineIndex] ?? [];
  }

  shownStep(fileIndex: number, lineIndex: number): number {
    return this.files[fileIndex]?.shownSteps[lineIndex] ?? -1;
  }

  getSelection(): SelectionSnapshot {
    return { ...this.selection, lastArrivalIndex: this.lastArrival };
  }

  applyFileMetadata(descriptors: readonly FileDescriptor[]): void {
    const files: FileEvents[] = Array.from({ length: descriptors.length }, () => new FileEvents(0));
    const table: FileDescriptor[] = [];
    const byName = new Map<string, number>();

    for (const descriptor of descriptors) {
      if (!isNonNegativeInt(descriptor.fileIndex) || descriptor.fileIndex >= files.length) {
        throw new IndexError(`bad file index at init: ${descriptor.fileIndex} len=${files.length}`);
      }
      if (!isNonNegativeInt(descriptor.lineCount)) {
        throw new IndexError(`bad line count for file index ${descriptor.fileIndex}: ${descriptor.lineCount}`);
      }
      files[descriptor.fileIndex] = new FileEvents(descriptor.lineCount);
      table[descriptor.fileIndex] = descriptor;
      byName.set(this.nameKey(descriptor.filename), descriptor.fileIndex);
    }

    this.files = files;
    this.descriptors = table;
    this.filesByName = byName;
    this.lastArrival = -1;
    this.selection = emptySelection();
  }

  applyEvent(fileIndex: number, lineIndex: number, payload: LineEventPayload): LineEvent {
    const file = isNonNegativeInt(fileIndex) ? this.files[fileIndex] : undefined;
    if (!file) {
      throw new IndexError(`bad file index: ${fileIndex} len=${this.files.length}`);
    }
    if (!isNonNegativeInt(lineIndex) || lineIndex >= file.lineCount) {
      throw new IndexError(`bad debug index: ${lineIndex} len=${file.lineCount}`);
    }

    const followLatest = this.selection.arrivalIndex === this.lastArrival;
    this.lastArrival += 1;
    const event = new LineEvent(this.lastArrival, fileIndex, lineIndex, payload);
    file.append(event);

    if (followLatest) {
      this.setCursor(this.lastArrival);
    }
    return event;
  }

  resolveSelectionForFile(fileIndex: number): FileResolution | null {
    const file = this.files[fileIndex];
    if (!file) return null;

    const cursor = this.selection.arrivalIndex;
    const found = file.resolve(cursor, this.options.formatter, this.options.placeholder);
    const selected = found ? { fileIndex, ...found } : null;
    if (selected) {
      this.selection = { ...this.selection, ...selected, edited: false, resolved: true };
    }
    return {
      fileIndex,
      entries: [...file.entries],
      shownSteps: [...file.shownSteps],
      selected,
    };
  }

  markSelectionEdited(): void {
    this.selection.edited = true;
  }

  moveSelection(move: SelectionMove): boolean {
    const cursor = this.selection.arrivalIndex;
    switch (move) {
      case "first":
        if (this.lastArrival >= 0) this.setCursor(0);
        return true;
      case "last":
        if (cursor < this.lastArrival) this.setCursor(this.lastArrival);
        return true;
      case "prev":
        if (cursor > 0) {
          this.setCursor(cursor - 1);
          return true;
        }
        return false;
      case "next":
        if (cursor < this.lastArrival) {
          this.setCursor(cursor + 1);
          return true;
        }
        return false;
    }
  }

  moveSelectionWithinLine(fileIndex: number, lineIndex: number, mode: LineStepMode): boolean {
    const file = this.files[fileIndex];
    const slot = file?.lines[lineIndex];
    if (!file || !slot || slot.length === 0) return false;

    let step = file.shownSteps[lineIndex] ?? -1;
    if (step < 0) step = 0;

    switch (mode) {
      case "current":
        break;
      case "current_prev":
        if (step === 0) return false;
        step -= 1;
        break;
      case "current_next":
        if (step >= slot.length - 1) return false;
        step += 1;
        break;
    }

    const event = slot[step];
    if (!event) return false;
    this.setCursor(event.arrivalIndex);
    return true;
  }

  clearSelection(): void {
    this.setCursor(-1);
  }

  clearEvents(): void {
    this.files = this.files.map((file) => new FileEvents(file.lineCount));
    this.lastArrival = -1;
    this.selection = emptySelection();
  }

  locateArrival(arrivalIndex: number): EventLocation | null {
    if (arrivalIndex < 0 || arrivalIndex > this.lastArrival) return null;
    for (const [fileIndex, file] of this.files.entries()) {
      for (const [lineIndex, slot] of file.lines.entries()) {
        const step = rightmostAtOrBefore(slot, arrivalIndex);
        if (step >= 0 && slot[step]?.arrivalIndex === arrivalIndex) {
          return { fileIndex, lineIndex, lineStep: step };
        }
      }
    }
    return null;
  }

  eventAt(location: EventLocation): LineEvent | undefined {
    return this.files[location.fileIndex]?.lines[location.lineIndex]?.[location.lineStep];
  }

  private setCursor(arrivalIndex: number): void {
    if (arrivalIndex === this.selection.arrivalIndex) return;
    this.selection = { ...this.selection, arrivalIndex, edited: false, resolved: false };
  }
}
