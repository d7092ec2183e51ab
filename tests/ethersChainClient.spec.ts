import {expect} from "chai";
import {HDNodeWallet, Transaction, Wallet, makeError} from "ethers";
import {
  EthersChainClient,
  createFundingWallet,
  derivationPath,
  toChainError
} from "../src/infrastructure/EthersChainClient";
import {ChainError} from "../src/shared/errors";
import {DEST_A} from "./support/fixtures";

const TEST_MNEMONIC = "test test test test test test test test test test test junk";

describe("toChainError", function () {
  it("classifies node rejections by message", function () {
    expect(toChainError(new Error("already known"), "broadcast").kind).to.equal("ALREADY_KNOWN");
    expect(toChainError(new Error("nonce too low: next nonce 8, tx nonce 5"), "broadcast").kind).to.equal(
      "SEQUENCE_CONFLICT"
    );
    expect(toChainError(new Error("replacement transaction underpriced"), "broadcast").kind).to.equal("FEE_TOO_LOW");
    expect(toChainError(new Error("max fee per gas less than block base fee"), "broadcast").kind).to.equal(
      "FEE_TOO_LOW"
    );
    expect(toChainError(new Error("insufficient funds for gas * price + value"), "broadcast").kind).to.equal(
      "TERMINAL"
    );
  });

  it("classifies ethers error codes", function () {
    expect(toChainError(makeError("nonce has already been used", "NONCE_EXPIRED"), "broadcast").kind).to.equal(
      "SEQUENCE_CONFLICT"
    );
    expect(toChainError(makeError("replacement fee too low", "REPLACEMENT_UNDERPRICED"), "broadcast").kind).to.equal(
      "FEE_TOO_LOW"
    );
    expect(toChainError(makeError("not enough", "INSUFFICIENT_FUNDS"), "broadcast").kind).to.equal("TERMINAL");
  });

  it("treats network failures as ambiguous only while broadcasting", function () {
    const dropped = new Error("socket hang up");
    expect(toChainError(dropped, "broadcast").kind).to.equal("AMBIGUOUS");
    expect(toChainError(dropped, "read").kind).to.equal("TRANSIENT");
    expect(toChainError(makeError("request timeout", "TIMEOUT"), "broadcast").kind).to.equal("AMBIGUOUS");
  });

  it("keeps the message and passes chain errors through", function () {
    const scripted = new ChainError("FEE_TOO_LOW", "scripted");
    expect(toChainError(scripted, "read")).to.equal(scripted);

    const refused = toChainError(new Error("invalid sender"), "broadcast");
    expect(refused.kind).to.equal("TERMINAL");
    expect(refused.message).to.equal("invalid sender");
    expect(toChainError(new Error("invalid sender"), "read").kind).to.equal("TRANSIENT");
  });
});

describe("createFundingWallet", function () {
  it("derives mnemonic accounts on the standard path", function () {
    expect(derivationPath(3)).to.equal("m/44'/60'/0'/0/3");

    const second = createFundingWallet({kind: "mnemonic", phrase: TEST_MNEMONIC, accountIndex: 1}, null);
    const expected = HDNodeWallet.fromPhrase(TEST_MNEMONIC, undefined, "m/44'/60'/0'/0/1");
    expect(second.address).to.equal(expected.address);

    const first = createFundingWallet({kind: "mnemonic", phrase: TEST_MNEMONIC, accountIndex: 0}, null);
    expect(first.address).not.to.equal(second.address);
  });

  it("loads a raw private key", function () {
    const key = `0x${"11".repeat(32)}`;
    const wallet = createFundingWallet({kind: "private-key", privateKey: key}, null);
    expect(wallet.address).to.equal(new Wallet(key).address);
  });

  it("rejects a malformed private key", function () {
    expect(() => createFundingWallet({kind: "private-key", privateKey: "not-a-key"}, null)).to.throw();
  });
});

describe("EthersChainClient", function () {
  it("signs for the configured chain without contacting the endpoint", async function () {
    const client = new EthersChainClient({
      rpcUrl: "http://127.0.0.1:9",
      chainId: 31_337,
      credential: {kind: "private-key", privateKey: `0x${"11".repeat(32)}`}
    });

    try {
      const signed = await client.signTransfer({
        to: DEST_A,
        value: 1_000n,
        nonce: 4,
        fee: {gasLimit: 21_000n, pricing: {type: "legacy", gasPrice: 1_000_000_000n}}
      });
      const parsed = Transaction.from(signed.raw);

      expect(parsed.chainId).to.equal(31_337n);
      expect(parsed.nonce).to.equal(4);
      expect(parsed.hash).to.equal(signed.hash);
      expect(signed.from).to.equal(client.fundingAddress);
    } finally {
      client.destroy();
    }
  });
});
