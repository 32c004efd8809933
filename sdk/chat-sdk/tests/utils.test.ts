import { expect } from "chai";
import { createHash } from "crypto";
import { mkdtempSync, rmSync, writeFileSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { Keypair, PublicKey } from "@solana/web3.js";
import BN from "bn.js";
import {
  deriveChatAccountAddress,
  formatLamports,
  loadKeypair,
  validateAccountName,
  validateMessageText,
  validateText,
} from "../src/utils";
import { CHAT_SEED } from "../src/constants";

describe("Utility Functions", () => {
  describe("Address derivation", () => {
    const owner = Keypair.generate().publicKey;
    const programId = Keypair.generate().publicKey;

    it("should hash owner, seed and program", async () => {
      const address = await deriveChatAccountAddress(owner, programId);

      const expected = createHash("sha256")
        .update(owner.toBuffer())
        .update(Buffer.from(CHAT_SEED))
        .update(programId.toBuffer())
        .digest();
      expect(address.equals(new PublicKey(expected))).to.be.true;
    });

    it("should derive the same address every time", async () => {
      const first = await deriveChatAccountAddress(owner, programId);
      const second = await deriveChatAccountAddress(owner, programId);
      expect(first.equals(second)).to.be.true;
    });

    it("should give different owners different accounts", async () => {
      const other = Keypair.generate().publicKey;
      const mine = await deriveChatAccountAddress(owner, programId);
      const theirs = await deriveChatAccountAddress(other, programId);
      expect(mine.equals(theirs)).to.be.false;
    });

    it("should reject seeds longer than 32 bytes", async () => {
      let error: unknown = null;
      try {
        await deriveChatAccountAddress(owner, programId, "s".repeat(33));
      } catch (e) {
        error = e;
      }
      expect(error).to.be.instanceOf(Error);
      expect(error instanceof Error && error.message).to.equal("Seed too long (max 32 bytes)");
    });
  });

  describe("Key loading", () => {
    let dir: string;

    before(() => {
      dir = mkdtempSync(join(tmpdir(), "chat-keys-"));
    });

    after(() => {
      rmSync(dir, { recursive: true, force: true });
    });

    it("should load a keypair file", () => {
      const keypair = Keypair.generate();
      const path = join(dir, "id.json");
      writeFileSync(path, JSON.stringify(Array.from(keypair.secretKey)));

      expect(loadKeypair(path).publicKey.equals(keypair.publicKey)).to.be.true;
    });

    it("should reject a file that is not a 64-byte array", () => {
      const path = join(dir, "short.json");
      writeFileSync(path, JSON.stringify([1, 2, 3]));

      expect(() => loadKeypair(path)).to.throw(`Keypair file ${path} must hold a 64-byte array`);
    });
  });

  describe("Amount formatting", () => {
    it("should format lamports as SOL", () => {
      expect(formatLamports(1_500_000_000)).to.equal("1.5");
      expect(formatLamports(1)).to.equal("0.000000001");
      expect(formatLamports(new BN("12000000000"))).to.equal("12");
    });

    it("should handle zero", () => {
      expect(formatLamports(0)).to.equal("0");
    });
  });

  describe("Validation", () => {
    it("should accept a name that fills the account", () => {
      expect(() => validateAccountName("a".repeat(5107))).to.not.throw();
    });

    it("should reject a name one byte too long", () => {
      expect(() => validateAccountName("a".repeat(5108))).to.throw(
        "Account name too long (max 5107 bytes)"
      );
    });

    it("should measure names in UTF-8 bytes", () => {
      // 4 characters, 8 bytes
      expect(() => validateAccountName("éééé", 21)).to.not.throw();
      expect(() => validateAccountName("ééééé", 21)).to.throw("max 8 bytes");
    });

    it("should reject empty names and messages", () => {
      expect(() => validateAccountName("")).to.throw("Account name cannot be empty");
      expect(() => validateMessageText("")).to.throw("Message cannot be empty");
    });

    it("should reject unpaired surrogates", () => {
      expect(() => validateText("Message", "bad \uD800 text")).to.throw(
        "Message is not valid Unicode text"
      );
      expect(() => validateMessageText("\uDC00")).to.throw("not valid Unicode");
      expect(() => validateMessageText("👋")).to.not.throw();
    });
  });
});
