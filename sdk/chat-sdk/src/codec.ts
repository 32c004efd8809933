/**
 * Binary codec for chat accounts and instructions
 *
 * All integers are little-endian. Strings are written as a u32 byte length
 * followed by raw UTF-8. Decoding strings is lossy: malformed sequences come
 * back as U+FFFD instead of failing.
 */

import { PublicKey } from "@solana/web3.js";
import {
  ACCOUNT_METADATA_BASE_SIZE,
  INSTRUCTION_TAG_SIZE,
  MESSAGE_HEADER_SIZE,
  METADATA_INITIALIZED_OFFSET,
  METADATA_LAST_MESSAGE_ID_OFFSET,
  METADATA_NAME_LEN_OFFSET,
  METADATA_NEXT_FREE_INDEX_OFFSET,
  PUBKEY_BYTES,
  U32_MAX,
  U32_SIZE,
} from "./constants";
import { ChatDeserializationError } from "./errors";
import {
  ChatCommand,
  type AccountMetadata,
  type ChatAccountData,
  type ChatInstruction,
  type Message,
} from "./types";

// ============================================================================
// Primitives
// ============================================================================

function asBuffer(data: Uint8Array): Buffer {
  return Buffer.isBuffer(data)
    ? data
    : Buffer.from(data.buffer, data.byteOffset, data.byteLength);
}

function ensureAvailable(
  data: Buffer,
  offset: number,
  length: number,
  field: string
): void {
  if (offset + length > data.length) {
    throw new ChatDeserializationError(
      `${field} needs ${length} bytes at offset ${offset}, only ${Math.max(data.length - offset, 0)} left`
    );
  }
}

function ensureExactSize(data: Buffer, expected: number, what: string): void {
  if (data.length !== expected) {
    throw new ChatDeserializationError(
      `${what} is ${expected} bytes, destination has ${data.length}`
    );
  }
}

function checkU32(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > U32_MAX) {
    throw new ChatDeserializationError(`${field} is not a u32: ${value}`);
  }
}

function checkU8(value: number, field: string): void {
  if (!Number.isInteger(value) || value < 0 || value > 0xff) {
    throw new ChatDeserializationError(`${field} is not a u8: ${value}`);
  }
}

function utf8Length(text: string): number {
  return Buffer.byteLength(text, "utf-8");
}

// ============================================================================
// Message
// ============================================================================

/**
 * Serialized size of a message: id, sender, length prefix and text
 */
export function messageSize(message: Message): number {
  return MESSAGE_HEADER_SIZE + utf8Length(message.msg);
}

/**
 * Serialize a message into a slice of exactly `messageSize(message)` bytes
 * @throws ChatDeserializationError on a size mismatch or an out-of-range id
 */
export function serializeMessage(message: Message, dst: Uint8Array): void {
  const data = asBuffer(dst);
  const msgLen = utf8Length(message.msg);
  ensureExactSize(data, MESSAGE_HEADER_SIZE + msgLen, "message");
  checkU32(message.id, "message id");
  checkU32(msgLen, "message length");

  let offset = 0;
  data.writeUInt32LE(message.id, offset);
  offset += U32_SIZE;
  message.from.toBuffer().copy(data, offset);
  offset += PUBKEY_BYTES;
  data.writeUInt32LE(msgLen, offset);
  offset += U32_SIZE;
  data.write(message.msg, offset, msgLen, "utf-8");
}

/**
 * Read one message starting at `offset`
 * @returns The message and the offset just past it
 */
export function readMessage(src: Uint8Array, offset: number = 0): [Message, number] {
  const data = asBuffer(src);
  ensureAvailable(data, offset, MESSAGE_HEADER_SIZE, "message header");

  const id = data.readUInt32LE(offset);
  offset += U32_SIZE;
  const from = new PublicKey(data.subarray(offset, offset + PUBKEY_BYTES));
  offset += PUBKEY_BYTES;
  const msgLen = data.readUInt32LE(offset);
  offset += U32_SIZE;

  ensureAvailable(data, offset, msgLen, "message text");
  const msg = data.toString("utf-8", offset, offset + msgLen);
  offset += msgLen;

  return [{ id, from, msg }, offset];
}

/** Decode a slice holding exactly one message */
export function decodeMessage(src: Uint8Array): Message {
  const [message, end] = readMessage(src);
  if (end !== src.length) {
    throw new ChatDeserializationError(
      `${src.length - end} trailing bytes after message`
    );
  }
  return message;
}

export function encodeMessage(message: Message): Buffer {
  const data = Buffer.alloc(messageSize(message));
  serializeMessage(message, data);
  return data;
}

/**
 * Build a message ready to send. The id is a placeholder, the program
 * assigns the real one.
 */
export function newMessage(from: PublicKey, msg: string, id: number = 0): Message {
  return { id, from, msg };
}

// ============================================================================
// Message Log
// ============================================================================

export function messagesSize(messages: readonly Message[]): number {
  return messages.reduce((total, message) => total + messageSize(message), 0);
}

/**
 * Serialize messages back to back into a slice of exactly their total size
 */
export function serializeMessages(
  messages: readonly Message[],
  dst: Uint8Array
): void {
  const data = asBuffer(dst);
  ensureExactSize(data, messagesSize(messages), "message list");

  let offset = 0;
  for (const message of messages) {
    const size = messageSize(message);
    serializeMessage(message, data.subarray(offset, offset + size));
    offset += size;
  }
}

/**
 * Decode a message log. The slice carries no count: messages are read until
 * the slice is consumed exactly, so a truncated log is an error.
 */
export function decodeMessages(src: Uint8Array): Message[] {
  const data = asBuffer(src);
  const messages: Message[] = [];
  let offset = 0;

  while (offset < data.length) {
    const [message, next] = readMessage(data, offset);
    messages.push(message);
    offset = next;
  }

  return messages;
}

// ============================================================================
// Account Metadata
// ============================================================================

export function accountMetadataSize(metadata: AccountMetadata): number {
  return ACCOUNT_METADATA_BASE_SIZE + utf8Length(metadata.name);
}

/**
 * Header for a freshly opened account. The write cursor starts right after
 * the header itself.
 */
export function newAccountMetadata(name: string): AccountMetadata {
  const metadata: AccountMetadata = {
    initialized: 1,
    nextFreeIndex: 0,
    lastMessageId: 0,
    name,
  };
  metadata.nextFreeIndex = accountMetadataSize(metadata);
  return metadata;
}

/**
 * Serialize the account header into a slice of exactly its size
 * @throws ChatDeserializationError on a size mismatch or an out-of-range field
 */
export function serializeAccountMetadata(
  metadata: AccountMetadata,
  dst: Uint8Array
): void {
  const data = asBuffer(dst);
  const nameLen = utf8Length(metadata.name);
  ensureExactSize(data, ACCOUNT_METADATA_BASE_SIZE + nameLen, "account metadata");
  checkU8(metadata.initialized, "initialized");
  checkU32(metadata.nextFreeIndex, "next free index");
  checkU32(metadata.lastMessageId, "last message id");
  checkU32(nameLen, "name length");

  data.writeUInt8(metadata.initialized, METADATA_INITIALIZED_OFFSET);
  data.writeUInt32LE(metadata.nextFreeIndex, METADATA_NEXT_FREE_INDEX_OFFSET);
  data.writeUInt32LE(metadata.lastMessageId, METADATA_LAST_MESSAGE_ID_OFFSET);
  data.writeUInt32LE(nameLen, METADATA_NAME_LEN_OFFSET);
  data.write(metadata.name, ACCOUNT_METADATA_BASE_SIZE, nameLen, "utf-8");
}

/**
 * Read an account header starting at `offset`
 * @returns The header and the offset just past it
 */
export function readAccountMetadata(
  src: Uint8Array,
  offset: number = 0
): [AccountMetadata, number] {
  const data = asBuffer(src);
  ensureAvailable(data, offset, ACCOUNT_METADATA_BASE_SIZE, "account metadata");

  const initialized = data.readUInt8(offset + METADATA_INITIALIZED_OFFSET);
  const nextFreeIndex = data.readUInt32LE(offset + METADATA_NEXT_FREE_INDEX_OFFSET);
  const lastMessageId = data.readUInt32LE(offset + METADATA_LAST_MESSAGE_ID_OFFSET);
  const nameLen = data.readUInt32LE(offset + METADATA_NAME_LEN_OFFSET);

  const nameStart = offset + ACCOUNT_METADATA_BASE_SIZE;
  ensureAvailable(data, nameStart, nameLen, "account name");
  const name = data.toString("utf-8", nameStart, nameStart + nameLen);

  return [
    { initialized, nextFreeIndex, lastMessageId, name },
    nameStart + nameLen,
  ];
}

/** Decode a slice holding exactly one account header */
export function decodeAccountMetadata(src: Uint8Array): AccountMetadata {
  const [metadata, end] = readAccountMetadata(src);
  if (end !== src.length) {
    throw new ChatDeserializationError(
      `${src.length - end} trailing bytes after account metadata`
    );
  }
  return metadata;
}

export function encodeAccountMetadata(metadata: AccountMetadata): Buffer {
  const data = Buffer.alloc(accountMetadataSize(metadata));
  serializeAccountMetadata(metadata, data);
  return data;
}

/**
 * Header size as recorded in raw account data, read from the name length
 * prefix without decoding the name
 */
export function accountMetadataSizeFromBuffer(src: Uint8Array): number {
  const data = asBuffer(src);
  ensureAvailable(data, 0, ACCOUNT_METADATA_BASE_SIZE, "account metadata");
  return ACCOUNT_METADATA_BASE_SIZE + data.readUInt32LE(METADATA_NAME_LEN_OFFSET);
}

// ============================================================================
// Whole Account
// ============================================================================

/**
 * Decode an account: the header, then the message log between the end of
 * the header and `nextFreeIndex`. Bytes past the cursor are ignored.
 */
export function decodeAccountData(src: Uint8Array): ChatAccountData {
  const data = asBuffer(src);
  const [metadata, logStart] = readAccountMetadata(data);

  if (metadata.nextFreeIndex <= logStart) {
    return { metadata, messages: [] };
  }
  if (metadata.nextFreeIndex > data.length) {
    throw new ChatDeserializationError(
      `next free index ${metadata.nextFreeIndex} is past the end of a ${data.length} byte account`
    );
  }

  return {
    metadata,
    messages: decodeMessages(data.subarray(logStart, metadata.nextFreeIndex)),
  };
}

// ============================================================================
// Instructions
// ============================================================================

export function chatInstructionSize(instruction: ChatInstruction): number {
  switch (instruction.command) {
    case ChatCommand.SendMessages:
      return INSTRUCTION_TAG_SIZE + messagesSize(instruction.messages);
    case ChatCommand.DeleteMessages:
      return INSTRUCTION_TAG_SIZE + U32_SIZE;
    case ChatCommand.OpenAccount:
      return INSTRUCTION_TAG_SIZE + accountMetadataSize(instruction.metadata);
  }
}

/**
 * Serialize an instruction: the discriminant byte, then the variant payload
 */
export function serializeChatInstruction(
  instruction: ChatInstruction,
  dst: Uint8Array
): void {
  const data = asBuffer(dst);
  ensureExactSize(data, chatInstructionSize(instruction), "instruction");

  data.writeUInt8(instruction.command, 0);
  const body = data.subarray(INSTRUCTION_TAG_SIZE);

  switch (instruction.command) {
    case ChatCommand.SendMessages:
      serializeMessages(instruction.messages, body);
      return;
    case ChatCommand.DeleteMessages:
      checkU32(instruction.id, "message id");
      body.writeUInt32LE(instruction.id, 0);
      return;
    case ChatCommand.OpenAccount:
      serializeAccountMetadata(instruction.metadata, body);
      return;
  }
}

export function encodeChatInstruction(instruction: ChatInstruction): Buffer {
  const data = Buffer.alloc(chatInstructionSize(instruction));
  serializeChatInstruction(instruction, data);
  return data;
}

/**
 * Decode instruction data
 * @throws ChatDeserializationError on an empty payload, an unknown tag or a
 * malformed variant body
 */
export function decodeChatInstruction(src: Uint8Array): ChatInstruction {
  const data = asBuffer(src);
  ensureAvailable(data, 0, INSTRUCTION_TAG_SIZE, "instruction tag");

  const tag = data.readUInt8(0);
  const body = data.subarray(INSTRUCTION_TAG_SIZE);

  switch (tag) {
    case ChatCommand.SendMessages:
      return {
        command: ChatCommand.SendMessages,
        messages: decodeMessages(body),
      };
    case ChatCommand.DeleteMessages:
      if (body.length !== U32_SIZE) {
        throw new ChatDeserializationError(
          `DeleteMessages payload is ${body.length} bytes, expected ${U32_SIZE}`
        );
      }
      return { command: ChatCommand.DeleteMessages, id: body.readUInt32LE(0) };
    case ChatCommand.OpenAccount:
      return {
        command: ChatCommand.OpenAccount,
        metadata: decodeAccountMetadata(body),
      };
    default:
      throw new ChatDeserializationError(`unknown instruction tag ${tag}`);
  }
}
