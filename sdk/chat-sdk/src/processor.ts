/**
 * Chat program instruction processor
 *
 * Applies one instruction to a chat account's data. Every mutation is made
 * on a staged copy of the account and committed in a single pass, so a
 * rejected instruction leaves the account byte-for-byte unchanged.
 */

import type { PublicKey } from "@solana/web3.js";
import { U32_MAX } from "./constants";
import {
  accountMetadataSize,
  decodeChatInstruction,
  messageSize,
  readAccountMetadata,
  serializeAccountMetadata,
  serializeMessage,
} from "./codec";
import { ChatDeserializationError, ChatProgramError } from "./errors";
import {
  ChatCommand,
  type AccountMetadata,
  type ChatInstruction,
  type Message,
  type ProcessResult,
  type ProgramAccount,
  type ProgramLog,
} from "./types";

// ============================================================================
// Account Arena
// ============================================================================

/**
 * Bump allocator over the account data. Regions are handed out from the
 * cursor forward and never past the account's capacity.
 */
class AccountArena {
  constructor(
    private readonly data: Buffer,
    private cursor: number
  ) {}

  get offset(): number {
    return this.cursor;
  }

  reserve(size: number): Buffer {
    if (this.cursor + size > this.data.length) {
      throw new ChatDeserializationError(
        `writing ${size} bytes at ${this.cursor} overflows the ${this.data.length} byte account`
      );
    }
    const region = this.data.subarray(this.cursor, this.cursor + size);
    this.cursor += size;
    return region;
  }
}

// ============================================================================
// Operations
// ============================================================================

function invalidInstruction(
  message: string,
  logs: string[],
  cause?: unknown
): ChatProgramError {
  return new ChatProgramError(message, "InvalidInstructionData", logs, cause);
}

/**
 * Id of the first message in the next batch. The very first message an
 * account ever stores takes `lastMessageId` as is; later batches continue
 * from `lastMessageId + 1`.
 */
function firstMessageId(metadata: AccountMetadata, headerSize: number): number {
  const logIsEmpty = metadata.nextFreeIndex === headerSize;
  return logIsEmpty ? metadata.lastMessageId : metadata.lastMessageId + 1;
}

/**
 * Append messages to the log and advance the header
 * @param headerSize - Byte length of the header as stored in the account
 * @returns The staged account data and the messages with their ids
 */
function receiveMessages(
  accountData: Buffer,
  metadata: AccountMetadata,
  headerSize: number,
  messages: Message[]
): [Buffer, Message[]] {
  // A stored name that is not valid UTF-8 re-encodes to a different length
  if (accountMetadataSize(metadata) !== headerSize) {
    throw new ChatDeserializationError(
      `stored header is ${headerSize} bytes but re-encodes to ${accountMetadataSize(metadata)}`
    );
  }
  if (
    metadata.nextFreeIndex < headerSize ||
    metadata.nextFreeIndex > accountData.length
  ) {
    throw new ChatDeserializationError(
      `next free index ${metadata.nextFreeIndex} is outside [${headerSize}, ${accountData.length}]`
    );
  }

  const firstId = firstMessageId(metadata, headerSize);
  const lastId = firstId + messages.length - 1;
  if (lastId > U32_MAX) {
    throw new ChatDeserializationError(`message id ${lastId} overflows u32`);
  }
  const numbered = messages.map((message, i) => ({ ...message, id: firstId + i }));

  const staged = Buffer.from(accountData);
  const arena = new AccountArena(staged, metadata.nextFreeIndex);
  for (const message of numbered) {
    serializeMessage(message, arena.reserve(messageSize(message)));
  }

  const updated: AccountMetadata = {
    ...metadata,
    nextFreeIndex: arena.offset,
    lastMessageId: lastId,
  };
  serializeAccountMetadata(updated, staged.subarray(0, headerSize));

  return [staged, numbered];
}

/**
 * Write the header of a new account
 * @returns The staged account data and the header as written
 */
function openAccount(
  accountData: Buffer,
  supplied: AccountMetadata
): [Buffer, AccountMetadata] {
  const metadata: AccountMetadata = {
    ...supplied,
    initialized: supplied.initialized === 0 ? 1 : supplied.initialized,
    nextFreeIndex: accountMetadataSize(supplied),
  };

  const staged = Buffer.from(accountData);
  const arena = new AccountArena(staged, 0);
  serializeAccountMetadata(metadata, arena.reserve(metadata.nextFreeIndex));

  return [staged, metadata];
}

// ============================================================================
// Processor
// ============================================================================

/**
 * Apply an instruction to raw account data.
 *
 * The account's current header is decoded first; data that does not even
 * parse as a header rejects the call. On success the account data is
 * updated in place.
 *
 * @param accountData - Chat account data, mutated only on success
 * @param instructionData - Encoded instruction
 * @param log - Receives program log lines
 * @returns The instruction as applied
 * @throws ChatProgramError with code InvalidInstructionData
 */
export function applyChatInstruction(
  accountData: Buffer,
  instructionData: Uint8Array,
  log: ProgramLog = () => {}
): ChatInstruction {
  const logs: string[] = [];
  const emit = (line: string): void => {
    logs.push(line);
    log(line);
  };

  let current: AccountMetadata;
  let headerSize: number;
  try {
    [current, headerSize] = readAccountMetadata(accountData);
  } catch (error) {
    throw invalidInstruction("Account data is not a chat account", logs, error);
  }

  let instruction: ChatInstruction;
  try {
    instruction = decodeChatInstruction(instructionData);
  } catch (error) {
    throw invalidInstruction("Instruction data could not be decoded", logs, error);
  }

  switch (instruction.command) {
    case ChatCommand.SendMessages: {
      emit("SendMessages");
      if (instruction.messages.length === 0) {
        return instruction;
      }
      if (current.initialized === 0) {
        throw invalidInstruction("Account is not open", logs);
      }
      try {
        const [staged, messages] = receiveMessages(
          accountData,
          current,
          headerSize,
          instruction.messages
        );
        staged.copy(accountData);
        return { command: ChatCommand.SendMessages, messages };
      } catch (error) {
        throw invalidInstruction("Messages could not be stored", logs, error);
      }
    }

    case ChatCommand.DeleteMessages:
      emit("DeleteMessages");
      throw invalidInstruction(
        `Deleting messages is not supported (id ${instruction.id})`,
        logs
      );

    case ChatCommand.OpenAccount: {
      emit("OpenAccount");
      const name = instruction.metadata.name;
      if (current.initialized !== 0) {
        emit(`Account: ${name} already exist`);
        throw invalidInstruction(`Account ${name} already exists`, logs);
      }
      emit(`Opening account: ${name}`);
      try {
        const [staged, metadata] = openAccount(accountData, instruction.metadata);
        staged.copy(accountData);
        return { command: ChatCommand.OpenAccount, metadata };
      } catch (error) {
        throw invalidInstruction("Account metadata could not be stored", logs, error);
      }
    }
  }
}

/**
 * Program entrypoint. Expects `[sender, chatAccount]`: the sender must sign
 * and the chat account must be writable and owned by the program.
 *
 * @param programId - Id the program runs under
 * @param accounts - Accounts passed with the instruction
 * @param instructionData - Encoded instruction
 * @throws ChatProgramError, carrying the log lines emitted before the rejection
 */
export function processInstruction(
  programId: PublicKey,
  accounts: readonly ProgramAccount[],
  instructionData: Uint8Array
): ProcessResult {
  const logs: string[] = ["Chat program entrypoint"];

  const [sender, chatAccount] = accounts;
  if (!sender || !chatAccount) {
    throw new ChatProgramError(
      `Expected 2 accounts, got ${accounts.length}`,
      "NotEnoughAccountKeys",
      logs
    );
  }
  if (!sender.isSigner) {
    throw new ChatProgramError(
      `Sender ${sender.pubkey.toBase58()} did not sign`,
      "IllegalOwner",
      logs
    );
  }
  if (!chatAccount.owner.equals(programId)) {
    throw new ChatProgramError(
      `Account ${chatAccount.pubkey.toBase58()} is not owned by the chat program`,
      "IncorrectProgramId",
      logs
    );
  }
  if (!chatAccount.isWritable) {
    throw new ChatProgramError(
      `Account ${chatAccount.pubkey.toBase58()} is not writable`,
      "InvalidInstructionData",
      logs
    );
  }

  try {
    const instruction = applyChatInstruction(
      chatAccount.data,
      instructionData,
      (line) => logs.push(line)
    );
    return { instruction, logs };
  } catch (error) {
    if (error instanceof ChatProgramError) {
      throw new ChatProgramError(error.message, error.code, logs, error.cause);
    }
    throw error;
  }
}
