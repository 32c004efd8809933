import { expect } from "chai";
import { Keypair, PublicKey } from "@solana/web3.js";
import {
  ChatClient,
  ChatCommand,
  ChatProgramError,
  createChatClient,
  decodeAccountData,
  decodeChatInstruction,
  deriveChatAccountAddress,
  keypairWallet,
} from "../src";
import { LocalLedger, rejectionOf } from "./helpers/local-ledger";

const LAMPORTS = 10_000_000_000;

describe("Chat Client", () => {
  let programId: PublicKey;
  let ledger: LocalLedger;
  let alice: Keypair;
  let bob: Keypair;
  let aliceClient: ChatClient;
  let bobClient: ChatClient;

  beforeEach(() => {
    programId = Keypair.generate().publicKey;
    ledger = new LocalLedger(programId);
    alice = Keypair.generate();
    bob = Keypair.generate();
    ledger.fund(alice.publicKey, LAMPORTS);
    ledger.fund(bob.publicKey, LAMPORTS);
    aliceClient = createChatClient({
      connection: ledger,
      programId,
      wallet: keypairWallet(alice),
    });
    bobClient = createChatClient({
      connection: ledger,
      programId,
      wallet: keypairWallet(bob),
    });
  });

  describe("Client setup", () => {
    it("should apply defaults", () => {
      expect(aliceClient.accountSize).to.equal(5120);
      expect(aliceClient.seed).to.equal("chat");
      expect(aliceClient.commitment).to.equal("confirmed");
      expect(aliceClient.walletPublicKey?.equals(alice.publicKey)).to.be.true;
    });

    it("should report no wallet until one is connected", async () => {
      const client = new ChatClient({ connection: ledger, programId });
      expect(client.walletPublicKey).to.be.null;

      const error = await rejectionOf(client.openAccount("alice"));
      expect(error.message).to.equal("Wallet not connected");

      client.connectWallet(keypairWallet(alice));
      expect(client.walletPublicKey?.equals(alice.publicKey)).to.be.true;
    });
  });

  describe("Instruction builders", () => {
    it("should put the signer first and the chat account second", () => {
      const chatAccount = Keypair.generate().publicKey;
      const ix = aliceClient.buildChatInstruction(alice.publicKey, chatAccount, {
        command: ChatCommand.DeleteMessages,
        id: 4,
      });

      expect(ix.programId.equals(programId)).to.be.true;
      expect(ix.keys).to.have.length(2);
      expect(ix.keys[0]?.pubkey.equals(alice.publicKey)).to.be.true;
      expect(ix.keys[0]?.isSigner).to.be.true;
      expect(ix.keys[1]?.pubkey.equals(chatAccount)).to.be.true;
      expect(ix.keys[1]?.isSigner).to.be.false;
      expect(ix.keys[1]?.isWritable).to.be.true;
      expect([...ix.data]).to.deep.equal([1, 4, 0, 0, 0]);
    });

    it("should allocate the account and write a fresh header", async () => {
      const { instructions, chatAccount } = await aliceClient.buildOpenAccountInstructions(
        alice.publicKey,
        "alice"
      );

      const expected = await deriveChatAccountAddress(alice.publicKey, programId);
      expect(chatAccount.equals(expected)).to.be.true;
      expect(instructions).to.have.length(2);
      expect(decodeChatInstruction(instructions[1]?.data ?? Buffer.alloc(0))).to.deep.equal({
        command: ChatCommand.OpenAccount,
        metadata: { initialized: 1, nextFreeIndex: 18, lastMessageId: 0, name: "alice" },
      });
    });

    it("should reject a name that does not fit the account", async () => {
      const error = await rejectionOf(
        aliceClient.buildOpenAccountInstructions(alice.publicKey, "a".repeat(5108))
      );
      expect(error.message).to.equal("Account name too long (max 5107 bytes)");
    });
  });

  describe("Opening accounts", () => {
    it("should create and open the wallet's chat account", async () => {
      const { chatAccount, signature } = await aliceClient.openAccount("alice");

      expect(signature).to.equal("local-signature-1");
      const info = await ledger.getAccountInfo(chatAccount);
      expect(info?.owner.equals(programId)).to.be.true;
      expect(info?.data.length).to.equal(5120);
      expect(info?.lamports).to.equal(36_526_080);
      expect(await ledger.getBalance(alice.publicKey)).to.equal(LAMPORTS - 36_526_080);

      const account = await aliceClient.receiveMessages();
      expect(account?.metadata).to.deep.equal({
        initialized: 1,
        nextFreeIndex: 18,
        lastMessageId: 0,
        name: "alice",
      });
      expect(ledger.transactionLogs).to.deep.equal([
        ["Chat program entrypoint", "OpenAccount", "Opening account: alice"],
      ]);
    });

    it("should do nothing when the account already exists", async () => {
      await aliceClient.openAccount("alice");
      const again = await aliceClient.openAccount("other");

      expect(again.signature).to.be.null;
      expect(ledger.transactionLogs).to.have.length(1);
      const account = await aliceClient.receiveMessages();
      expect(account?.metadata.name).to.equal("alice");
    });
  });

  describe("Messaging", () => {
    it("should deliver a message to another user's account", async () => {
      const { chatAccount } = await aliceClient.openAccount("alice");

      const signature = await bobClient.sendMessage(chatAccount, "hi");
      expect(signature).to.equal("local-signature-2");

      const account = await bobClient.receiveMessages(alice.publicKey);
      expect(account?.metadata.nextFreeIndex).to.equal(60);
      expect(account?.metadata.lastMessageId).to.equal(0);
      expect(account?.messages).to.have.length(1);
      expect(account?.messages[0]?.id).to.equal(0);
      expect(account?.messages[0]?.from.equals(bob.publicKey)).to.be.true;
      expect(account?.messages[0]?.msg).to.equal("hi");
    });

    it("should keep messages in arrival order", async () => {
      const { chatAccount } = await aliceClient.openAccount("alice");
      await bobClient.sendMessage(chatAccount, "one");
      await aliceClient.sendMessage(chatAccount, "two");

      const account = await aliceClient.fetchChatAccount(chatAccount);
      expect(account?.messages.map((m) => [m.id, m.msg])).to.deep.equal([
        [0, "one"],
        [1, "two"],
      ]);
      expect(account?.messages[1]?.from.equals(alice.publicKey)).to.be.true;
    });

    it("should reject sending to an account that does not exist", async () => {
      const missing = await deriveChatAccountAddress(alice.publicKey, programId);
      const error = await rejectionOf(bobClient.sendMessage(missing, "hi"));
      expect(error.message).to.equal(`Chat account ${missing.toBase58()} does not exist`);
    });

    it("should reject an empty message before sending", async () => {
      const { chatAccount } = await aliceClient.openAccount("alice");
      const error = await rejectionOf(bobClient.sendMessage(chatAccount, ""));
      expect(error.message).to.equal("Message cannot be empty");
      expect(ledger.transactionLogs).to.have.length(1);
    });

    it("should return null for an account that was never created", async () => {
      expect(await bobClient.receiveMessages()).to.be.null;
    });
  });

  describe("Rejected transactions", () => {
    it("should surface the program error and leave the account unchanged", async () => {
      const { chatAccount } = await aliceClient.openAccount("alice");
      await bobClient.sendMessage(chatAccount, "hi");
      const before = await ledger.getAccountInfo(chatAccount);

      const error = await rejectionOf(
        bobClient.sendTransaction([
          bobClient.buildChatInstruction(bob.publicKey, chatAccount, {
            command: ChatCommand.DeleteMessages,
            id: 0,
          }),
        ])
      );

      expect(error).to.be.instanceOf(ChatProgramError);
      expect(error instanceof ChatProgramError && error.code).to.equal("InvalidInstructionData");
      const after = await ledger.getAccountInfo(chatAccount);
      expect(after?.data.equals(before?.data ?? Buffer.alloc(0))).to.be.true;
      expect(decodeAccountData(after?.data ?? Buffer.alloc(0)).messages).to.have.length(1);
    });

    it("should roll back account creation when opening fails", async () => {
      const { instructions, chatAccount } = await aliceClient.buildOpenAccountInstructions(
        alice.publicKey,
        "alice"
      );
      const [createAccount] = instructions;
      if (!createAccount) {
        throw new Error("expected a create-account instruction");
      }
      const badOpen = aliceClient.buildChatInstruction(alice.publicKey, chatAccount, {
        command: ChatCommand.SendMessages,
        messages: [],
      });
      badOpen.data = Buffer.from([9]);

      await rejectionOf(aliceClient.sendTransaction([createAccount, badOpen]));

      expect(await ledger.getAccountInfo(chatAccount)).to.be.null;
      expect(await ledger.getBalance(alice.publicKey)).to.equal(LAMPORTS);
    });
  });
});
