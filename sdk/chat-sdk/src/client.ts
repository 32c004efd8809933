/**
 * Chat Client
 *
 * Builds chat program instructions, opens seed-derived chat accounts,
 * submits messages and reads account contents back.
 */

import {
  Connection,
  Keypair,
  PublicKey,
  SystemProgram,
  Transaction,
  TransactionInstruction,
  type AccountInfo,
  type BlockhashWithExpiryBlockHeight,
  type BlockheightBasedTransactionConfirmationStrategy,
  type Commitment,
  type ConfirmOptions,
  type RpcResponseAndContext,
  type SendOptions,
  type SignatureResult,
  type TransactionSignature,
} from "@solana/web3.js";

import {
  CHAT_ACCOUNT_SIZE,
  CHAT_SEED,
  LOCALNET_RPC_URL,
} from "./constants";
import {
  decodeAccountData,
  encodeChatInstruction,
  newAccountMetadata,
  newMessage,
} from "./codec";
import {
  deriveChatAccountAddress,
  validateAccountName,
  validateMessageText,
} from "./utils";
import { ChatCommand, type ChatAccountData, type ChatInstruction } from "./types";

// ============================================================================
// Client Configuration
// ============================================================================

/**
 * The part of the RPC connection the client uses. A `Connection` satisfies
 * it; tests pass an in-process ledger.
 */
export interface ChatConnection {
  getAccountInfo(
    publicKey: PublicKey,
    commitment?: Commitment
  ): Promise<AccountInfo<Buffer> | null>;
  getBalance(publicKey: PublicKey, commitment?: Commitment): Promise<number>;
  getMinimumBalanceForRentExemption(
    dataLength: number,
    commitment?: Commitment
  ): Promise<number>;
  getLatestBlockhash(
    commitment?: Commitment
  ): Promise<BlockhashWithExpiryBlockHeight>;
  sendRawTransaction(
    rawTransaction: Buffer | Uint8Array | Array<number>,
    options?: SendOptions
  ): Promise<TransactionSignature>;
  confirmTransaction(
    strategy: BlockheightBasedTransactionConfirmationStrategy,
    commitment?: Commitment
  ): Promise<RpcResponseAndContext<SignatureResult>>;
}

export interface ChatWallet {
  publicKey: PublicKey;
  signTransaction: (tx: Transaction) => Promise<Transaction>;
}

export interface ChatClientConfig {
  connection: ChatConnection;
  /** Deployed chat program */
  programId: PublicKey;
  wallet?: ChatWallet;
  commitment?: Commitment;
  confirmOptions?: ConfirmOptions;
  /** Bytes allocated for new chat accounts (default 5120) */
  accountSize?: number;
  /** Seed for chat account derivation (default "chat") */
  seed?: string;
}

/** Result of opening a chat account */
export interface OpenAccountResult {
  chatAccount: PublicKey;
  /** Null when the account already existed and nothing was sent */
  signature: string | null;
}

/**
 * Wrap a keypair as a wallet
 */
export function keypairWallet(keypair: Keypair): ChatWallet {
  return {
    publicKey: keypair.publicKey,
    signTransaction: async (tx) => {
      tx.partialSign(keypair);
      return tx;
    },
  };
}

// ============================================================================
// Chat Client
// ============================================================================

export class ChatClient {
  readonly connection: ChatConnection;
  readonly programId: PublicKey;
  readonly commitment: Commitment;
  readonly confirmOptions: ConfirmOptions;
  readonly accountSize: number;
  readonly seed: string;

  private wallet?: ChatWallet;

  constructor(config: ChatClientConfig) {
    this.connection = config.connection;
    this.programId = config.programId;
    this.commitment = config.commitment ?? "confirmed";
    this.confirmOptions = config.confirmOptions ?? {
      commitment: this.commitment,
      preflightCommitment: this.commitment,
    };
    this.accountSize = config.accountSize ?? CHAT_ACCOUNT_SIZE;
    this.seed = config.seed ?? CHAT_SEED;
    this.wallet = config.wallet;
  }

  /**
   * Get the current wallet public key
   */
  get walletPublicKey(): PublicKey | null {
    return this.wallet?.publicKey ?? null;
  }

  /**
   * Connect a wallet
   */
  connectWallet(wallet: ChatWallet): void {
    this.wallet = wallet;
  }

  private requireWallet(): ChatWallet {
    if (!this.wallet) {
      throw new Error("Wallet not connected");
    }
    return this.wallet;
  }

  // ============================================================================
  // Transaction Helpers
  // ============================================================================

  /**
   * Build, sign and send a transaction, then wait for confirmation
   */
  async sendTransaction(
    instructions: TransactionInstruction[],
    options?: ConfirmOptions
  ): Promise<string> {
    const wallet = this.requireWallet();

    const tx = new Transaction();
    tx.add(...instructions);

    const { blockhash, lastValidBlockHeight } =
      await this.connection.getLatestBlockhash(this.commitment);
    tx.recentBlockhash = blockhash;
    tx.lastValidBlockHeight = lastValidBlockHeight;
    tx.feePayer = wallet.publicKey;

    const signedTx = await wallet.signTransaction(tx);

    const signature = await this.connection.sendRawTransaction(
      signedTx.serialize(),
      options ?? this.confirmOptions
    );

    const confirmation = await this.connection.confirmTransaction(
      {
        signature,
        blockhash,
        lastValidBlockHeight,
      },
      this.commitment
    );
    if (confirmation.value.err) {
      throw new Error(
        `Transaction ${signature} failed: ${JSON.stringify(confirmation.value.err)}`
      );
    }

    return signature;
  }

  // ============================================================================
  // Instruction Builders
  // ============================================================================

  /**
   * Derive the chat account for a wallet (defaults to the connected one)
   */
  async deriveChatAddress(owner?: PublicKey): Promise<PublicKey> {
    return deriveChatAccountAddress(
      owner ?? this.requireWallet().publicKey,
      this.programId,
      this.seed
    );
  }

  /**
   * Build a chat program instruction. The sender signs; the chat account is
   * the one the program writes to.
   */
  buildChatInstruction(
    from: PublicKey,
    chatAccount: PublicKey,
    instruction: ChatInstruction
  ): TransactionInstruction {
    return new TransactionInstruction({
      programId: this.programId,
      keys: [
        { pubkey: from, isSigner: true, isWritable: true },
        { pubkey: chatAccount, isSigner: false, isWritable: true },
      ],
      data: encodeChatInstruction(instruction),
    });
  }

  /**
   * Build the instructions that allocate a chat account and write its header
   */
  async buildOpenAccountInstructions(
    owner: PublicKey,
    name: string
  ): Promise<{ instructions: TransactionInstruction[]; chatAccount: PublicKey }> {
    validateAccountName(name, this.accountSize);

    const chatAccount = await this.deriveChatAddress(owner);
    const lamports = await this.connection.getMinimumBalanceForRentExemption(
      this.accountSize,
      this.commitment
    );

    const createAccount = SystemProgram.createAccountWithSeed({
      fromPubkey: owner,
      newAccountPubkey: chatAccount,
      basePubkey: owner,
      seed: this.seed,
      lamports,
      space: this.accountSize,
      programId: this.programId,
    });

    const openAccount = this.buildChatInstruction(owner, chatAccount, {
      command: ChatCommand.OpenAccount,
      metadata: newAccountMetadata(name),
    });

    return { instructions: [createAccount, openAccount], chatAccount };
  }

  // ============================================================================
  // Chat Operations
  // ============================================================================

  /**
   * Open the connected wallet's chat account. Does nothing when the account
   * already exists.
   */
  async openAccount(name: string): Promise<OpenAccountResult> {
    const wallet = this.requireWallet();
    const chatAccount = await this.deriveChatAddress(wallet.publicKey);

    const existing = await this.connection.getAccountInfo(chatAccount, this.commitment);
    if (existing) {
      return { chatAccount, signature: null };
    }

    const { instructions } = await this.buildOpenAccountInstructions(
      wallet.publicKey,
      name
    );
    const signature = await this.sendTransaction(instructions);

    return { chatAccount, signature };
  }

  /**
   * Append a message to another user's chat account
   * @param toChatAccount - Recipient's chat account
   * @param text - Message text
   */
  async sendMessage(toChatAccount: PublicKey, text: string): Promise<string> {
    const wallet = this.requireWallet();
    validateMessageText(text);

    const destination = await this.connection.getAccountInfo(
      toChatAccount,
      this.commitment
    );
    if (!destination) {
      throw new Error(`Chat account ${toChatAccount.toBase58()} does not exist`);
    }

    const instruction = this.buildChatInstruction(wallet.publicKey, toChatAccount, {
      command: ChatCommand.SendMessages,
      messages: [newMessage(wallet.publicKey, text)],
    });

    return this.sendTransaction([instruction]);
  }

  /**
   * Fetch and decode a chat account
   */
  async fetchChatAccount(address: PublicKey): Promise<ChatAccountData | null> {
    const accountInfo = await this.connection.getAccountInfo(address, this.commitment);
    if (!accountInfo) {
      return null;
    }
    return decodeAccountData(accountInfo.data);
  }

  /**
   * Read the messages stored in a wallet's chat account (defaults to the
   * connected wallet)
   */
  async receiveMessages(owner?: PublicKey): Promise<ChatAccountData | null> {
    return this.fetchChatAccount(await this.deriveChatAddress(owner));
  }
}

// ============================================================================
// Factory Functions
// ============================================================================

/**
 * Create a new ChatClient instance
 */
export function createChatClient(config: ChatClientConfig): ChatClient {
  return new ChatClient(config);
}

/**
 * Create a client connected to a local validator
 */
export function createLocalnetClient(
  programId: PublicKey,
  wallet?: ChatWallet,
  rpcUrl?: string
): ChatClient {
  const config: ChatClientConfig = {
    connection: new Connection(rpcUrl ?? LOCALNET_RPC_URL, "confirmed"),
    programId,
  };
  if (wallet) {
    config.wallet = wallet;
  }
  return new ChatClient(config);
}
