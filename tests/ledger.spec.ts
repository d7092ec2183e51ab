import {expect} from "chai";
import {FakeChainClient} from "../src/infrastructure/FakeChainClient";
import {LedgerStateCache} from "../src/services/LedgerStateCache";
import {ChainError} from "../src/shared/errors";

describe("LedgerStateCache", function () {
  let clock: number;
  let chain: FakeChainClient;
  let ledger: LedgerStateCache;

  beforeEach(function () {
    clock = 1_700_000_000_000;
    chain = new FakeChainClient({startingSequence: 5});
    ledger = new LedgerStateCache(chain, {maxStateAgeMs: 60_000, rpcTimeoutMs: 1_000}, () => clock);
  });

  it("reserves consecutive numbers with a single chain read", async function () {
    expect(await ledger.reserveNextSequence()).to.equal(5);
    expect(await ledger.reserveNextSequence()).to.equal(6);
    expect(await ledger.reserveNextSequence()).to.equal(7);

    expect(chain.sequenceReads).to.equal(1);
    expect(ledger.snapshot().reserved).to.deep.equal([5, 6, 7]);
  });

  it("hands out distinct numbers to concurrent reservations", async function () {
    const numbers = await Promise.all([
      ledger.reserveNextSequence(),
      ledger.reserveNextSequence(),
      ledger.reserveNextSequence(),
      ledger.reserveNextSequence()
    ]);
    expect(numbers).to.deep.equal([5, 6, 7, 8]);
  });

  it("reuses a released number instead of leaving a gap", async function () {
    await ledger.reserveNextSequence();
    await ledger.reserveNextSequence();
    await ledger.release(5);

    expect(await ledger.reserveNextSequence()).to.equal(5);
    expect(ledger.snapshot().reserved).to.deep.equal([5, 6]);
  });

  it("advances the next sequence on confirm", async function () {
    const sequence = await ledger.reserveNextSequence();
    await ledger.confirm(sequence);

    const snapshot = ledger.snapshot();
    expect(snapshot.nextSequence).to.equal(6);
    expect(snapshot.reserved).to.deep.equal([]);
    expect(await ledger.reserveNextSequence()).to.equal(6);
  });

  it("keeps reservations owned across a reconcile", async function () {
    await ledger.reserveNextSequence();
    await ledger.reserveNextSequence();

    expect(await ledger.reconcile()).to.equal(5);
    expect(ledger.snapshot().reserved).to.deep.equal([5, 6]);
    expect(await ledger.reserveNextSequence()).to.equal(7);
  });

  it("never reconciles below a confirmed number", async function () {
    await ledger.reconcile();
    await ledger.confirm(9);

    expect(await ledger.reconcile()).to.equal(10);
  });

  it("re-reads the chain after being marked stale", async function () {
    expect(await ledger.reserveNextSequence()).to.equal(5);
    await ledger.markStale("sequence_conflict:nonce too low");
    expect(ledger.snapshot().stale).to.equal(true);
    expect(ledger.snapshot().staleReason).to.equal("sequence_conflict:nonce too low");

    chain.advanceExternally(3);
    expect(await ledger.reserveNextSequence()).to.equal(8);
    expect(chain.sequenceReads).to.equal(2);
    expect(ledger.snapshot().stale).to.equal(false);
  });

  it("re-reads the chain once the cached state is older than the max age", async function () {
    await ledger.reserveNextSequence();
    clock += 60_000;
    await ledger.reserveNextSequence();
    expect(chain.sequenceReads).to.equal(1);

    clock += 1;
    await ledger.reserveNextSequence();
    expect(chain.sequenceReads).to.equal(2);
  });

  it("adopts a recovered number exactly once", async function () {
    await ledger.adopt(3);
    expect(ledger.snapshot().reserved).to.deep.equal([3]);

    let caught: unknown = null;
    try {
      await ledger.adopt(3);
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(Error);
    expect(caught instanceof Error ? caught.message : "").to.equal("sequence-already-reserved:3");
  });

  it("surfaces an unreachable chain as a transient chain error", async function () {
    chain.setReachable(false);

    let caught: unknown = null;
    try {
      await ledger.reserveNextSequence();
    } catch (error) {
      caught = error;
    }
    expect(caught).to.be.instanceOf(ChainError);
    expect(caught instanceof ChainError ? caught.kind : null).to.equal("TRANSIENT");
    expect(ledger.snapshot().nextSequence).to.equal(null);
  });
});
