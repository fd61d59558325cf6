export class IndexError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "IndexError";
  }
}

export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class InvalidTargetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidTargetError";
  }
}

// Not thrown: the controller turns this condition into a user-visible warning.
export class StaleSelectionError extends Error {
  constructor(
    readonly filename: string,
    readonly arrivalIndex: number,
  ) {
    super(`selection at edited file: ${filename}: step ${arrivalIndex}`);
    this.name = "StaleSelectionError";
  }
}

export function asErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
