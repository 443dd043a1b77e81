export type HandErrorCode =
  | "InvalidCardCount"
  | "InvalidRankSymbol"
  | "InvalidSuitSymbol"
  | "MultipleWildcards";

/** 手札文字列の検証エラー（パーサからそのまま呼び出し側へ伝播する） */
export class HandError extends Error {
  readonly code: HandErrorCode;
  readonly input: string;

  constructor(code: HandErrorCode, input: string, message: string) {
    super(message);
    this.name = "HandError";
    this.code = code;
    this.input = input;
  }
}

export const isHandError = (e: unknown): e is HandError => e instanceof HandError;
