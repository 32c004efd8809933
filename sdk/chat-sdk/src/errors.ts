/**
 * Error types raised by the codec and the program
 */

/**
 * Raised by the codec when bytes cannot be read or written: a destination
 * slice of the wrong size, an out-of-range integer, an unknown tag or a
 * length prefix pointing past the end of the input.
 */
export class ChatDeserializationError extends Error {
  constructor(message: string = "can't deserialize data") {
    super(message);
    this.name = "ChatDeserializationError";
  }
}

/** Program error codes, named after the ledger's built-in program errors */
export type ChatProgramErrorCode =
  | "InvalidInstructionData"
  | "NotEnoughAccountKeys"
  | "IllegalOwner"
  | "IncorrectProgramId";

/**
 * Rejection of an instruction by the program. The account data is left
 * exactly as it was before the instruction.
 */
export class ChatProgramError extends Error {
  constructor(
    message: string,
    public readonly code: ChatProgramErrorCode,
    public readonly logs: string[] = [],
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = "ChatProgramError";
  }
}
