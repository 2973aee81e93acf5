export class CascadeError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CascadeError";
  }
}

export class StylesheetParseError extends CascadeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "StylesheetParseError";
  }
}

export class SelectorParseError extends CascadeError {
  readonly selectorText: string;

  constructor(message: string, selectorText: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "SelectorParseError";
    this.selectorText = selectorText;
  }
}

export class InlineStyleParseError extends CascadeError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "InlineStyleParseError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
