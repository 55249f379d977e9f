export class SheetcropError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export type SourcePosition = { offset: number; line: number; column: number };

export function positionAt(text: string, offset: number): SourcePosition {
  let line = 1;
  let lineStart = 0;
  const end = Math.min(offset, text.length);
  for (let i = 0; i < end; i++) {
    if (text.charCodeAt(i) === 10) {
      line++;
      lineStart = i + 1;
    }
  }
  return { offset, line, column: offset - lineStart + 1 };
}

// Unbalanced or malformed grammar. Fatal for the whole run.
export class StructuralError extends SheetcropError {
  readonly position: SourcePosition;

  constructor(message: string, position: SourcePosition) {
    super(`${message} at line ${position.line}, column ${position.column}`);
    this.position = position;
  }
}

export class EmptyInputError extends SheetcropError {
  constructor() {
    super('Document contains no expression');
  }
}

export type RegionField = 'label' | 'at' | 'size';

// Recovered locally: the entry is skipped and extraction continues.
export class MissingFieldError extends SheetcropError {
  readonly field: RegionField;
  readonly index: number;

  constructor(field: RegionField, index: number, detail: string) {
    super(`Region #${index} skipped: ${detail}`);
    this.field = field;
    this.index = index;
  }
}

// Recovered locally: scale falls back to 1.0.
export class UnitResolutionError extends SheetcropError {}

export type ExternalTool = 'renderer' | 'rasterizer';

export class ExternalToolError extends SheetcropError {
  readonly tool: ExternalTool;
  readonly diagnostic: string;

  constructor(tool: ExternalTool, message: string, diagnostic = '', cause?: unknown) {
    super(diagnostic ? `${message}: ${diagnostic}` : message, { cause });
    this.tool = tool;
    this.diagnostic = diagnostic;
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
