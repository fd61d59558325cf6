import type { TraceValue } from "@linelens/contracts";

export interface ValueFormatter {
  brief(value: TraceValue): string;
  full(value: TraceValue): string;
}

export function compactText(text: string, maxLen: number): string {
  const oneLine = text.replace(/\s+/g, " ").trim();
  if (maxLen <= 0 || oneLine.length <= maxLen) {
    return oneLine;
  }
  return `${oneLine.slice(0, Math.max(0, maxLen - 1))}…`;
}

export function createValueFormatter(maxValueLength: number): ValueFormatter {
  return {
    brief: (value) => compactText(JSON.stringify(value), maxValueLength),
    full: (value) => JSON.stringify(value),
  };
}
