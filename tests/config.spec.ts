import {expect} from "chai";
import {loadConfig} from "../src/config/env";
import {ConfigError} from "../src/shared/errors";

const BASE_ENV = {
  FAUCET_RPC_URL: "http://127.0.0.1:8545",
  FAUCET_CHAIN_ID: "31337",
  FAUCET_PRIVATE_KEY: `0x${"11".repeat(32)}`,
  FAUCET_GRANT_AMOUNT_ETH: "0.5",
  FAUCET_COOLDOWN_SECS: "3600",
  FAUCET_MAX_IN_FLIGHT: "8",
  FAUCET_MIN_BALANCE_ETH: "10"
};

function configErrorOf(run: () => unknown): ConfigError {
  try {
    run();
  } catch (error) {
    if (error instanceof ConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error("expected a ConfigError");
}

describe("loadConfig", function () {
  it("reads the required settings and applies defaults", function () {
    const config = loadConfig(BASE_ENV);

    expect(config.rpcUrl).to.equal("http://127.0.0.1:8545");
    expect(config.chainId).to.equal(31_337);
    expect(config.credential).to.deep.equal({kind: "private-key", privateKey: BASE_ENV.FAUCET_PRIVATE_KEY});
    expect(config.grantAmountWei).to.equal(500_000_000_000_000_000n);
    expect(config.minBalanceWei).to.equal(10_000_000_000_000_000_000n);
    expect(config.admission).to.deep.equal({cooldownMs: 3_600_000, maxInFlight: 8});
    expect(config.port).to.equal(8111);
    expect(config.submitter).to.deep.equal({
      retry: {maxAttempts: 5, baseDelayMs: 500, maxDelayMs: 8_000, feeBumpPercent: 25},
      rpcTimeoutMs: 10_000,
      pollIntervalMs: 7_000,
      confirmationTimeoutMs: 300_000,
      statusRequeryLimit: 3
    });
    expect(config.ledger).to.deep.equal({maxStateAgeMs: 60_000, rpcTimeoutMs: 10_000});
    expect(config.clientTimeoutMs).to.equal(30_000);
    expect(config.databasePath).to.equal(null);
    expect(config.explorerTxUrl).to.equal(null);
    expect(config.gatewayKey).to.equal(null);
  });

  it("reads the explorer link prefix and the gateway key", function () {
    const config = loadConfig({
      ...BASE_ENV,
      FAUCET_EXPLORER_TX_URL: "https://explorer.test/tx/",
      FAUCET_GATEWAY_KEY: "test-gateway-key"
    });

    expect(config.explorerTxUrl).to.equal("https://explorer.test/tx/");
    expect(config.gatewayKey).to.equal("test-gateway-key");
  });

  it("requires a positive chain id", function () {
    const {FAUCET_CHAIN_ID: _unused, ...rest} = BASE_ENV;

    expect(configErrorOf(() => loadConfig(rest)).problems).to.deep.equal(["missing-env:FAUCET_CHAIN_ID"]);
    expect(configErrorOf(() => loadConfig({...BASE_ENV, FAUCET_CHAIN_ID: "0"})).problems).to.deep.equal([
      "invalid-env:FAUCET_CHAIN_ID:expected integer >= 1"
    ]);
  });

  it("takes a mnemonic with an account index", function () {
    const {FAUCET_PRIVATE_KEY: _unused, ...rest} = BASE_ENV;
    const config = loadConfig({...rest, FAUCET_MNEMONIC: "test-mnemonic words", FAUCET_ACCOUNT_INDEX: "2"});

    expect(config.credential).to.deep.equal({kind: "mnemonic", phrase: "test-mnemonic words", accountIndex: 2});
  });

  it("reports every problem at once", function () {
    const error = configErrorOf(() =>
      loadConfig({
        FAUCET_GRANT_AMOUNT_ETH: "lots",
        FAUCET_COOLDOWN_SECS: "-5",
        FAUCET_MAX_IN_FLIGHT: "0",
        FAUCET_MIN_BALANCE_ETH: "1"
      })
    );

    expect(error.problems).to.deep.equal([
      "missing-env:FAUCET_RPC_URL",
      "missing-env:FAUCET_CHAIN_ID",
      "missing-env:FAUCET_PRIVATE_KEY|FAUCET_MNEMONIC",
      "invalid-env:FAUCET_GRANT_AMOUNT_ETH:expected ether amount",
      "invalid-env:FAUCET_COOLDOWN_SECS:expected integer >= 0",
      "invalid-env:FAUCET_MAX_IN_FLIGHT:expected integer >= 1"
    ]);
    expect(error.message).to.match(/^invalid-config: missing-env:FAUCET_RPC_URL, /);
  });

  it("rejects two credentials and a zero grant", function () {
    const error = configErrorOf(() =>
      loadConfig({...BASE_ENV, FAUCET_MNEMONIC: "test-mnemonic words", FAUCET_GRANT_AMOUNT_ETH: "0"})
    );

    expect(error.problems).to.deep.equal([
      "conflicting-env:FAUCET_PRIVATE_KEY,FAUCET_MNEMONIC",
      "invalid-env:FAUCET_GRANT_AMOUNT_ETH:expected positive ether amount"
    ]);
  });

  it("rejects a backoff ceiling below its base", function () {
    const error = configErrorOf(() =>
      loadConfig({...BASE_ENV, FAUCET_BACKOFF_BASE_MS: "1000", FAUCET_BACKOFF_MAX_MS: "10"})
    );

    expect(error.problems).to.deep.equal(["invalid-env:FAUCET_BACKOFF_MAX_MS:must be >= FAUCET_BACKOFF_BASE_MS"]);
  });
});
