export type AnswerSheetErrorCode =
  | "INDEX_OUT_OF_RANGE"
  | "CURSOR_EXHAUSTED"
  | "CONFIGURATION_INVALID"
  | "RECORD_INVALID";

export abstract class AnswerSheetError extends Error {
  public abstract readonly code: AnswerSheetErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class IndexOutOfRangeError extends AnswerSheetError {
  public readonly code = "INDEX_OUT_OF_RANGE" as const;
  public readonly index: number;
  public readonly length: number;

  constructor(index: number, length: number) {
    super(`Index ${index} out of bounds [0, ${length}).`);
    this.index = index;
    this.length = length;
  }
}

export class CursorExhaustedError extends AnswerSheetError {
  public readonly code = "CURSOR_EXHAUSTED" as const;

  constructor(length: number) {
    super(`Cannot write past the last slot; all ${length} slots are filled.`);
  }
}

export class ConfigurationInvalidError extends AnswerSheetError {
  public readonly code = "CONFIGURATION_INVALID" as const;
}

export class RecordInvalidError extends AnswerSheetError {
  public readonly code = "RECORD_INVALID" as const;
}
