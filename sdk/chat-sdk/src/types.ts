/**
 * Type definitions for the chat protocol
 */

import type { PublicKey } from "@solana/web3.js";

// ============================================================================
// Stored Data
// ============================================================================

/** A single chat entry as stored in the account's message log */
export interface Message {
  /** Sequence number, assigned by the program */
  id: number;
  /** Sender identity */
  from: PublicKey;
  /** Message text; its UTF-8 length is written as msg_len */
  msg: string;
}

/** Header at offset 0 of every chat account */
export interface AccountMetadata {
  /** 0 while unopened, nonzero once OpenAccount has run */
  initialized: number;
  /** Exclusive end of the message log and write cursor for the next append */
  nextFreeIndex: number;
  /** Highest message id assigned so far */
  lastMessageId: number;
  /** Account display name; its UTF-8 length is written as name_len */
  name: string;
}

/** Decoded contents of a whole chat account */
export interface ChatAccountData {
  metadata: AccountMetadata;
  messages: Message[];
}

// ============================================================================
// Instructions
// ============================================================================

/** Instruction discriminant, the first byte of every instruction */
export enum ChatCommand {
  /** Append messages to the log */
  SendMessages = 0,
  /** Declared on the wire, rejected by the program */
  DeleteMessages = 1,
  /** Write the account header */
  OpenAccount = 2,
}

export interface SendMessagesInstruction {
  command: ChatCommand.SendMessages;
  messages: Message[];
}

export interface DeleteMessagesInstruction {
  command: ChatCommand.DeleteMessages;
  id: number;
}

export interface OpenAccountInstruction {
  command: ChatCommand.OpenAccount;
  metadata: AccountMetadata;
}

/** Union type for all chat instructions */
export type ChatInstruction =
  | SendMessagesInstruction
  | DeleteMessagesInstruction
  | OpenAccountInstruction;

// ============================================================================
// Program Execution
// ============================================================================

/** An account handed to the program for one instruction */
export interface ProgramAccount {
  pubkey: PublicKey;
  isSigner: boolean;
  isWritable: boolean;
  /** Program that owns the account */
  owner: PublicKey;
  /** Account data, mutated in place on success */
  data: Buffer;
}

/** Sink for program log lines */
export type ProgramLog = (line: string) => void;

/** Outcome of a successfully applied instruction */
export interface ProcessResult {
  /** The decoded instruction, with ids as assigned by the program */
  instruction: ChatInstruction;
  /** Log lines emitted while processing */
  logs: string[];
}
