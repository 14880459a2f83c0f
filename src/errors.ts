export class CorpusError extends Error {
  constructor(message: string, public readonly statusCode: number = 500) {
    super(message);
    this.name = 'CorpusError';
  }
}

/**
 * A key that does not parse as "surah:ayah" with a surah in 1..114 and a positive ayah.
 */
export class MalformedKeyError extends CorpusError {
  constructor(public readonly rawKey: string, detail?: string) {
    super(`Malformed verse key "${rawKey}"${detail ? `: ${detail}` : ''}`, 400);
    this.name = 'MalformedKeyError';
  }
}

/**
 * A record, or a whole dataset, that lacks a required field or has the wrong shape.
 */
export class SchemaError extends CorpusError {
  constructor(message: string, public readonly verseKey?: string) {
    super(message, 500);
    this.name = 'SchemaError';
  }
}

export class InvalidQueryError extends CorpusError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'InvalidQueryError';
  }
}

export class NotFoundError extends CorpusError {
  constructor(message: string) {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}
