/**
 * Protocol constants matching the on-chain chat program
 */

// ============================================================================
// Wire Sizes
// ============================================================================

/** Size of a u8 field in bytes */
export const U8_SIZE = 1;

/** Size of a u32 field in bytes */
export const U32_SIZE = 4;

/** Largest value a u32 field can hold */
export const U32_MAX = 0xffff_ffff;

/** Size of a serialized public key */
export const PUBKEY_BYTES = 32;

/** Instruction discriminant size */
export const INSTRUCTION_TAG_SIZE = U8_SIZE;

/** Fixed part of a serialized message: id + from + msg_len */
export const MESSAGE_HEADER_SIZE = U32_SIZE + PUBKEY_BYTES + U32_SIZE;

/** Fixed part of the account header: initialized + next_free_index + last_message_id + name_len */
export const ACCOUNT_METADATA_BASE_SIZE = U8_SIZE + U32_SIZE * 3;

// Offsets inside the account header
export const METADATA_INITIALIZED_OFFSET = 0;
export const METADATA_NEXT_FREE_INDEX_OFFSET = U8_SIZE;
export const METADATA_LAST_MESSAGE_ID_OFFSET = U8_SIZE + U32_SIZE;
export const METADATA_NAME_LEN_OFFSET = U8_SIZE + U32_SIZE * 2;

// ============================================================================
// Account Configuration
// ============================================================================

/** Chat account capacity in bytes (5 KiB) */
export const CHAT_ACCOUNT_SIZE = 5 * 1024;

/** Seed used to derive a user's chat account from their wallet */
export const CHAT_SEED = "chat";

/** Longest seed the system program accepts for create-with-seed */
export const MAX_SEED_LENGTH = 32;

// ============================================================================
// Network Configuration
// ============================================================================

/** Local validator RPC endpoint */
export const LOCALNET_RPC_URL = "http://localhost:8899";

/** Environment variable the CLI reads the RPC endpoint from */
export const RPC_ENDPOINT_ENV = "SOLANA_RPC_ENDPOINT";

/** Lamport decimals used when formatting balances as SOL */
export const SOL_DECIMALS = 9;
