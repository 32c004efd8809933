#!/usr/bin/env node
/**
 * chat-cli: open a chat account, send and read messages from a terminal
 */

import { PublicKey } from "@solana/web3.js";

import { createLocalnetClient, keypairWallet, type ChatClient } from "./client";
import { LOCALNET_RPC_URL, RPC_ENDPOINT_ENV } from "./constants";
import type { ChatAccountData } from "./types";
import { formatLamports, loadKeypair } from "./utils";

type FlagValue = string | boolean;

export interface ParsedArgs {
  command: string | null;
  flags: Record<string, FlagValue>;
}

export const usage = `Usage: chat-cli <command> [options]

Commands:
  open_account   Create and open your chat account (--account-name)
  send           Send a message to a chat account (--to-user, --message)
  receive        Print your chat account and its messages
  address        Print your chat account address
  delete         Delete messages (not supported)

Options:
  --keypair <path>           Wallet keypair file
  --program-keypair <path>   Chat program keypair file
  --program-id <base58>      Chat program id (instead of --program-keypair)
  --account-name <name>      Name for open_account
  --to-user <base58>         Recipient chat account for send
  --message <text>           Message text for send
  --rpc <url>                RPC endpoint (default $${RPC_ENDPOINT_ENV} or ${LOCALNET_RPC_URL})
  -h, --help                 Show this help`;

/**
 * Split argv into a command and `--flag value` pairs. `--flag=value` is
 * accepted too; a flag with no value is `true`.
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const flags: Record<string, FlagValue> = {};
  let command: string | null = null;

  for (let i = 0; i < argv.length; i += 1) {
    const arg = argv[i];
    if (arg === undefined) {
      continue;
    }
    if (!command && !arg.startsWith("-")) {
      command = arg;
      continue;
    }
    if (arg === "-h") {
      flags.help = true;
      continue;
    }
    if (!arg.startsWith("--")) {
      throw new Error(`Unexpected argument: ${arg}`);
    }

    const trimmed = arg.slice(2);
    const eqIndex = trimmed.indexOf("=");
    if (eqIndex >= 0) {
      flags[trimmed.slice(0, eqIndex)] = trimmed.slice(eqIndex + 1);
      continue;
    }
    const next = argv[i + 1];
    if (next !== undefined && !next.startsWith("--")) {
      flags[trimmed] = next;
      i += 1;
    } else {
      flags[trimmed] = true;
    }
  }

  return { command, flags };
}

function stringFlag(flags: Record<string, FlagValue>, name: string): string | null {
  const value = flags[name];
  return typeof value === "string" ? value : null;
}

function requireFlag(flags: Record<string, FlagValue>, name: string): string {
  const value = stringFlag(flags, name);
  if (value === null) {
    throw new Error(`Missing --${name}`);
  }
  return value;
}

/**
 * RPC endpoint: --rpc, then the environment, then the local validator
 */
export function resolveRpcUrl(
  flags: Record<string, FlagValue>,
  env: NodeJS.ProcessEnv = process.env
): string {
  return stringFlag(flags, "rpc") ?? env[RPC_ENDPOINT_ENV] ?? LOCALNET_RPC_URL;
}

export function resolveProgramId(flags: Record<string, FlagValue>): PublicKey {
  const programId = stringFlag(flags, "program-id");
  if (programId !== null) {
    return new PublicKey(programId);
  }
  return loadKeypair(requireFlag(flags, "program-keypair")).publicKey;
}

/**
 * Render a decoded account, one message per line
 */
export function formatChatAccount(account: ChatAccountData): string {
  const { metadata, messages } = account;
  const lines = [
    `Account: ${metadata.name}`,
    `Next free index: ${metadata.nextFreeIndex}`,
    `Last message id: ${metadata.lastMessageId}`,
    `Messages: ${messages.length}`,
  ];
  for (const message of messages) {
    lines.push(`  #${message.id} ${message.from.toBase58()}: ${message.msg}`);
  }
  return lines.join("\n");
}

async function openAccount(client: ChatClient, flags: Record<string, FlagValue>) {
  const name = requireFlag(flags, "account-name");
  const owner = client.walletPublicKey;
  if (owner) {
    const lamports = await client.connection.getBalance(owner);
    console.log(`User: ${owner.toBase58()} has ${formatLamports(lamports)} SOL`);
  }

  const { chatAccount, signature } = await client.openAccount(name);
  if (signature === null) {
    console.log(`Account ${chatAccount.toBase58()} already exist`);
    return;
  }
  console.log(`Created account ${chatAccount.toBase58()}`);
  console.log(`Signature: ${signature}`);
}

async function send(client: ChatClient, flags: Record<string, FlagValue>) {
  const to = new PublicKey(requireFlag(flags, "to-user"));
  const message = requireFlag(flags, "message");
  const signature = await client.sendMessage(to, message);
  console.log(`Signature: ${signature}`);
}

async function receive(client: ChatClient) {
  const account = await client.receiveMessages();
  if (!account) {
    console.log("account is empty");
    return;
  }
  console.log(formatChatAccount(account));
}

/**
 * Run one CLI command
 */
export async function runCli(argv: string[]): Promise<void> {
  const parsed = parseArgs(argv);
  if (!parsed.command || parsed.flags.help) {
    console.log(usage);
    return;
  }

  if (parsed.command === "delete") {
    throw new Error("Deleting messages is not supported");
  }

  const wallet = keypairWallet(loadKeypair(requireFlag(parsed.flags, "keypair")));
  const rpcUrl = resolveRpcUrl(parsed.flags);
  const client = createLocalnetClient(resolveProgramId(parsed.flags), wallet, rpcUrl);
  console.log(`Using RPC: ${rpcUrl}`);

  switch (parsed.command) {
    case "open_account":
      await openAccount(client, parsed.flags);
      return;
    case "send":
      await send(client, parsed.flags);
      return;
    case "receive":
      await receive(client);
      return;
    case "address":
      console.log(`Address: ${(await client.deriveChatAddress()).toBase58()}`);
      return;
    default:
      console.log(`Unknown command: ${parsed.command}`);
      console.log(usage);
  }
}

if (require.main === module) {
  runCli(process.argv.slice(2)).catch((error: unknown) => {
    console.error(error instanceof Error ? error.message : error);
    process.exitCode = 1;
  });
}
