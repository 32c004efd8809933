/**
 * Chat Program SDK
 *
 * Wire codec, instruction processor and client for an append-only message
 * log kept in a fixed-size Solana account
 *
 * @packageDocumentation
 */

export * from "./client";
export * from "./types";
export * from "./constants";
export * from "./errors";
export * from "./utils";
export * from "./codec";
export * from "./processor";
