/**
 * Utility functions for the chat protocol
 */

import { Keypair, PublicKey } from "@solana/web3.js";
import { readFileSync } from "fs";
import BN from "bn.js";
import {
  ACCOUNT_METADATA_BASE_SIZE,
  CHAT_ACCOUNT_SIZE,
  CHAT_SEED,
  MAX_SEED_LENGTH,
  SOL_DECIMALS,
} from "./constants";

// ============================================================================
// Address Derivation
// ============================================================================

/**
 * Derive the chat account owned by `programId` for a wallet.
 * Same inputs always give the same address.
 *
 * @param owner - Wallet that funds and owns the chat account
 * @param programId - Chat program
 * @param seed - Derivation seed (default "chat")
 */
export async function deriveChatAccountAddress(
  owner: PublicKey,
  programId: PublicKey,
  seed: string = CHAT_SEED
): Promise<PublicKey> {
  if (Buffer.byteLength(seed, "utf-8") > MAX_SEED_LENGTH) {
    throw new Error(`Seed too long (max ${MAX_SEED_LENGTH} bytes)`);
  }
  return PublicKey.createWithSeed(owner, seed, programId);
}

// ============================================================================
// Key Loading
// ============================================================================

/**
 * Load a keypair from a JSON file holding the 64-byte secret key as an array
 * of numbers, the format `solana-keygen` writes
 */
export function loadKeypair(path: string): Keypair {
  const raw: unknown = JSON.parse(readFileSync(path, "utf-8"));
  if (
    !Array.isArray(raw) ||
    raw.length !== 64 ||
    !raw.every((b) => Number.isInteger(b) && b >= 0 && b <= 255)
  ) {
    throw new Error(`Keypair file ${path} must hold a 64-byte array`);
  }
  return Keypair.fromSecretKey(Uint8Array.from(raw));
}

// ============================================================================
// Amount Formatting
// ============================================================================

/**
 * Format a lamport balance as SOL
 * @param lamports - Balance in lamports
 * @returns Formatted string without trailing zeros
 */
export function formatLamports(lamports: BN | number): string {
  const amount = BN.isBN(lamports) ? lamports : new BN(lamports);
  const divisor = new BN(10).pow(new BN(SOL_DECIMALS));
  const whole = amount.div(divisor);
  const fraction = amount.mod(divisor);

  const trimmedFraction = fraction
    .toString()
    .padStart(SOL_DECIMALS, "0")
    .replace(/0+$/, "");

  if (trimmedFraction) {
    return `${whole.toString()}.${trimmedFraction}`;
  }
  return whole.toString();
}

// ============================================================================
// Validation
// ============================================================================

const LONE_SURROGATE = /[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/**
 * Check that text encodes to UTF-8 without substitution
 * @throws If the text contains an unpaired surrogate
 */
export function validateText(label: string, text: string): void {
  if (LONE_SURROGATE.test(text)) {
    throw new Error(`${label} is not valid Unicode text`);
  }
}

/**
 * Validate an account name
 * @param name - Name to store in the account header
 * @param accountSize - Capacity of the account the header goes into
 * @throws If the name is empty, malformed or does not fit
 */
export function validateAccountName(
  name: string,
  accountSize: number = CHAT_ACCOUNT_SIZE
): void {
  if (!name || name.length === 0) {
    throw new Error("Account name cannot be empty");
  }
  validateText("Account name", name);
  const maxNameBytes = accountSize - ACCOUNT_METADATA_BASE_SIZE;
  if (Buffer.byteLength(name, "utf-8") > maxNameBytes) {
    throw new Error(`Account name too long (max ${maxNameBytes} bytes)`);
  }
}

/**
 * Validate message text
 * @throws If the text is empty or malformed
 */
export function validateMessageText(text: string): void {
  if (!text || text.length === 0) {
    throw new Error("Message cannot be empty");
  }
  validateText("Message", text);
}
