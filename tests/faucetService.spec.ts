import {expect} from "chai";
import fc from "fast-check";
import {DisbursementRepo} from "../src/db/repo";
import {FAKE_FUNDING_ADDRESS, FakeChainClient} from "../src/infrastructure/FakeChainClient";
import {FaucetService, FaucetServiceConfig} from "../src/services/FaucetService";
import {DisbursementOutcome} from "../src/types/disbursement.types";
import {
  DEST_A,
  DEST_B,
  DEST_C,
  TestClock,
  createRepo,
  createTestClock,
  makeRequest,
  serviceConfig
} from "./support/fixtures";

interface ServiceHarness {
  chain: FakeChainClient;
  repo: DisbursementRepo;
  clock: TestClock;
  service: FaucetService;
}

async function createService(
  chain = new FakeChainClient({startingSequence: 5}),
  config: FaucetServiceConfig = serviceConfig(),
  options: {repo?: DisbursementRepo; persist?: () => void} = {}
): Promise<ServiceHarness> {
  const clock = createTestClock();
  const repo = options.repo ?? (await createRepo());
  const service = new FaucetService({
    chain,
    repo,
    config,
    now: clock.now,
    sleep: clock.sleep,
    persist: options.persist
  });
  return {chain, repo, clock, service};
}

function expectConfirmed(outcome: DisbursementOutcome): {txHash: string; sequence: number; disbursementId: string} {
  if (outcome.kind !== "CONFIRMED") {
    throw new Error(`expected CONFIRMED, got ${outcome.kind}`);
  }
  return outcome;
}

describe("FaucetService", function () {
  it("confirms three disbursements on sequences 5, 6 and 7 and caches 8 next", async function () {
    const {service, chain} = await createService();
    await service.start();

    const first = expectConfirmed(await service.requestDisbursement("alice", DEST_A));
    const second = expectConfirmed(await service.requestDisbursement("bob", DEST_B));
    const third = expectConfirmed(await service.requestDisbursement("carol", DEST_C));

    expect([first.sequence, second.sequence, third.sequence]).to.deep.equal([5, 6, 7]);
    expect(service.ledgerSnapshot().nextSequence).to.equal(8);
    expect(service.ledgerSnapshot().reserved).to.deep.equal([]);
    expect(chain.balanceOf(DEST_B)).to.equal(100_000_000_000_000_000n);

    await service.stop();
  });

  it("admits exactly the ceiling while the chain is stalled and rejects the next with backpressure", async function () {
    const chain = new FakeChainClient({startingSequence: 5});
    const {service} = await createService(chain, serviceConfig({admission: {cooldownMs: 60_000, maxInFlight: 2}}));
    await service.start();
    chain.stallSubmits();

    const first = service.requestDisbursement("alice", DEST_A);
    const second = service.requestDisbursement("bob", DEST_B);
    const third = await service.requestDisbursement("carol", DEST_C);

    expect(third).to.deep.equal({
      kind: "RATE_LIMITED",
      cause: "backpressure",
      reason: "in-flight ceiling 2 reached",
      retryAfterMs: null
    });
    expect(service.queue.depth).to.equal(2);

    chain.releaseStalled();
    const settled = [expectConfirmed(await first), expectConfirmed(await second)];
    expect(settled.map((outcome) => outcome.sequence)).to.deep.equal([5, 6]);

    await service.stop();
  });

  it("maps admission rejections onto caller outcomes", async function () {
    const {service} = await createService();
    await service.start();

    expectConfirmed(await service.requestDisbursement("alice", DEST_A));

    expect(await service.requestDisbursement("alice", DEST_B)).to.deep.equal({
      kind: "RATE_LIMITED",
      cause: "cooldown",
      reason: "cooldown active for 60000ms",
      retryAfterMs: 60_000
    });
    expect(await service.requestDisbursement("bob", "0x1234")).to.deep.equal({
      kind: "INVALID_ADDRESS",
      reason: "not a 0x-prefixed 20-byte hex address: 0x1234"
    });

    await service.stop();
  });

  it("answers PENDING when the client timeout elapses and finishes the job anyway", async function () {
    const chain = new FakeChainClient({startingSequence: 5});
    const {service} = await createService(chain, serviceConfig({clientTimeoutMs: 20}));
    await service.start();
    chain.stallSubmits();

    const outcome = await service.requestDisbursement("alice", DEST_A);
    if (outcome.kind !== "PENDING") {
      throw new Error(`expected PENDING, got ${outcome.kind}`);
    }
    expect(service.getDisbursement(outcome.disbursementId)?.record.status).to.equal("QUEUED");

    chain.releaseStalled();
    await service.queue.whenEmpty();

    const details = service.getDisbursement(outcome.disbursementId);
    expect(details?.record.status).to.equal("CONFIRMED");
    expect(details?.record.sequence).to.equal(5);
    expect(details?.attempts).to.have.length(1);

    await service.stop();
  });

  it("reports health live from the funding balance", async function () {
    const chain = new FakeChainClient({startingSequence: 5});
    const {service} = await createService(chain);

    expect(await service.healthStatus()).to.deep.equal({
      healthy: true,
      reachableChain: true,
      fundingBalanceAboveThreshold: true,
      fundingBalance: "1000000000000000000000",
      fundingAddress: FAKE_FUNDING_ADDRESS,
      queueDepth: 0,
      fatalError: null
    });

    chain.setBalance(999_999_999_999_999_999n);
    const low = await service.healthStatus();
    expect(low.healthy).to.equal(false);
    expect(low.fundingBalanceAboveThreshold).to.equal(false);
    expect(low.fundingBalance).to.equal("999999999999999999");

    chain.setBalance(1_000_000_000_000_000_000n);
    expect((await service.healthStatus()).healthy).to.equal(true);

    chain.setReachable(false);
    const unreachable = await service.healthStatus();
    expect(unreachable.healthy).to.equal(false);
    expect(unreachable.reachableChain).to.equal(false);
    expect(unreachable.fundingBalance).to.equal(null);
  });

  it("keeps running when the chain is unreachable at startup and clears the error once it answers", async function () {
    const chain = new FakeChainClient({startingSequence: 5});
    const {service} = await createService(chain);
    chain.setReachable(false);

    await service.start();
    chain.setReachable(true);
    const degraded = await service.healthStatus();
    expect(degraded.healthy).to.equal(false);
    expect(degraded.fatalError).to.equal("chain-unreachable-at-startup: connect ECONNREFUSED");

    await service.maintain();
    const recovered = await service.healthStatus();
    expect(recovered.healthy).to.equal(true);
    expect(recovered.fatalError).to.equal(null);

    await service.stop();
  });

  it("refuses new requests once stopping and persists on stop", async function () {
    let persisted = 0;
    const {service} = await createService(undefined, serviceConfig(), {
      persist: () => {
        persisted += 1;
      }
    });
    await service.start();

    const inFlight = service.requestDisbursement("alice", DEST_A);
    await service.stop();

    expectConfirmed(await inFlight);
    expect(persisted).to.equal(1);
    expect(await service.requestDisbursement("bob", DEST_B)).to.deep.equal({
      kind: "UNAVAILABLE",
      reason: "faucet is shutting down"
    });
  });

  it("resumes archived work after a restart", async function () {
    const chain = new FakeChainClient({startingSequence: 5});
    const repo = await createRepo();

    const broadcastRequest = makeRequest("broadcast-before-restart", {submittedAt: 1_000});
    const fee = await chain.estimateFee(DEST_A, 1000n);
    const signed = await chain.signTransfer({to: DEST_A, value: 1000n, nonce: 5, fee});
    await chain.submitSignedTransaction(signed);
    repo.create(broadcastRequest);
    repo.updateStatus(broadcastRequest.id, "SUBMITTED", 1_001, {sequence: 5, txHash: signed.hash});

    const queuedRequest = makeRequest("queued-before-restart", {destination: DEST_B, submittedAt: 2_000});
    repo.create(queuedRequest);

    const {service} = await createService(chain, serviceConfig(), {repo});
    await service.start();
    await service.queue.whenEmpty();

    expect(repo.getById(broadcastRequest.id)?.status).to.equal("CONFIRMED");
    expect(repo.getById(queuedRequest.id)?.status).to.equal("CONFIRMED");
    expect(repo.getById(queuedRequest.id)?.sequence).to.equal(6);
    expect(chain.accepted).to.have.length(2);
    expect(service.ledgerSnapshot().nextSequence).to.equal(7);

    await service.stop();
  });

  it("continues attempt numbers from the archive when a halted job resumes", async function () {
    const chain = new FakeChainClient({startingSequence: 5});
    const repo = await createRepo();
    const request = makeRequest("halted-before-restart", {submittedAt: 1_000});
    repo.create(request);
    repo.recordAttempt(request.id, {
      attempt: 1,
      sequence: 5,
      txHash: null,
      fee: null,
      submittedAt: 1_001,
      error: "rpc-timeout:submit:1000ms"
    });

    const {service} = await createService(chain, serviceConfig(), {repo});
    await service.start();
    await service.queue.whenEmpty();

    expect(repo.getById(request.id)?.status).to.equal("CONFIRMED");
    expect(chain.accepted).to.have.length(1);
    expect(repo.listAttempts(request.id).map((attempt) => [attempt.attempt, attempt.error])).to.deep.equal([
      [1, "rpc-timeout:submit:1000ms"],
      [2, null]
    ]);

    await service.stop();
  });

  it("never hands the same sequence to two transfers under concurrent requests", async function () {
    this.timeout(20_000);
    await fc.assert(
      fc.asyncProperty(
        fc.array(fc.record({requester: fc.integer({min: 0, max: 5}), destination: fc.integer({min: 1, max: 6})}), {
          minLength: 1,
          maxLength: 12
        }),
        fc.integer({min: 0, max: 2}),
        async (requests, transientFailures) => {
          const chain = new FakeChainClient({startingSequence: 5});
          chain.failNextSubmits("TRANSIENT", transientFailures);
          const {service} = await createService(chain);
          await service.start();

          const outcomes = await Promise.all(
            requests.map((entry) =>
              service.requestDisbursement(`user-${entry.requester}`, `0x${String(entry.destination).repeat(40)}`)
            )
          );
          await service.stop();

          const sequences = outcomes.flatMap((outcome) => (outcome.kind === "CONFIRMED" ? [outcome.sequence] : []));
          const admitted = outcomes.filter((outcome) => outcome.kind !== "RATE_LIMITED");
          expect(admitted).to.have.length(sequences.length);

          const sorted = [...sequences].sort((a, b) => a - b);
          expect(sorted).to.deep.equal(sorted.map((_, index) => 5 + index));
          expect(new Set(chain.accepted.map((tx) => tx.nonce)).size).to.equal(chain.accepted.length);
          expect(chain.accepted).to.have.length(sequences.length);
        }
      ),
      {numRuns: 25}
    );
  });
});
