export type ErrorStage = 'input' | 'primitives' | 'reconcile' | 'feedback';

export class BomExtractionError extends Error {
  readonly stage: ErrorStage;
  readonly page?: number;

  constructor(message: string, stage: ErrorStage, options: { page?: number; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'BomExtractionError';
    this.stage = stage;
    this.page = options.page;
  }
}

export class InvalidInputError extends BomExtractionError {
  constructor(message: string, cause?: unknown) {
    super(message, 'input', { cause });
    this.name = 'InvalidInputError';
  }
}

export class UnreadablePageError extends BomExtractionError {
  readonly reason: string;

  constructor(page: number, reason: string, cause?: unknown) {
    super(`Page ${page} could not be decoded: ${reason}`, 'primitives', { page, cause });
    this.name = 'UnreadablePageError';
    this.reason = reason;
  }
}

export class NoExtractableContentError extends BomExtractionError {
  constructor(message: string, stage: ErrorStage) {
    super(message, stage);
    this.name = 'NoExtractableContentError';
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
