import { parseEther } from "ethers";
import { ConfigError } from "../shared/errors";
import { FaucetConfig, FundingCredential } from "../types/config.types";

type Env = Record<string, string | undefined>;

/**
 * Collects every problem before failing, so a misconfigured deployment
 * reports all of them in one `invalid-config` error.
 */
class EnvReader {
  readonly problems: string[] = [];

  constructor(private readonly env: Env) {}

  optional(name: string): string | null {
    const value = this.env[name]?.trim();
    return value ? value : null;
  }

  requireEnv(name: string): string {
    const value = this.optional(name);
    if (value === null) {
      this.problems.push(`missing-env:${name}`);
      return "";
    }
    return value;
  }

  integer(name: string, fallback: number | null, min = 0): number {
    const raw = fallback === null ? this.requireEnv(name) : this.optional(name);
    if (raw === null) {
      return fallback ?? 0;
    }
    if (raw === "") {
      return 0;
    }
    if (!/^\d+$/.test(raw) || Number(raw) < min || !Number.isSafeInteger(Number(raw))) {
      this.problems.push(`invalid-env:${name}:expected integer >= ${min}`);
      return 0;
    }
    return Number(raw);
  }

  ether(name: string, allowZero: boolean): bigint {
    const raw = this.requireEnv(name);
    if (raw === "") {
      return 0n;
    }
    try {
      const wei = parseEther(raw);
      if (wei < 0n || (!allowZero && wei === 0n)) {
        this.problems.push(`invalid-env:${name}:expected ${allowZero ? "non-negative" : "positive"} ether amount`);
      }
      return wei;
    } catch {
      this.problems.push(`invalid-env:${name}:expected ether amount`);
      return 0n;
    }
  }
}

function readCredential(reader: EnvReader): FundingCredential {
  const privateKey = reader.optional("FAUCET_PRIVATE_KEY");
  const phrase = reader.optional("FAUCET_MNEMONIC");

  if (privateKey && phrase) {
    reader.problems.push("conflicting-env:FAUCET_PRIVATE_KEY,FAUCET_MNEMONIC");
  }
  if (privateKey) {
    return { kind: "private-key", privateKey };
  }
  if (phrase) {
    return { kind: "mnemonic", phrase, accountIndex: reader.integer("FAUCET_ACCOUNT_INDEX", 0) };
  }

  reader.problems.push("missing-env:FAUCET_PRIVATE_KEY|FAUCET_MNEMONIC");
  return { kind: "private-key", privateKey: "" };
}

export function loadConfig(env: Env = process.env): FaucetConfig {
  const reader = new EnvReader(env);

  const rpcUrl = reader.requireEnv("FAUCET_RPC_URL");
  const chainId = reader.integer("FAUCET_CHAIN_ID", null, 1);
  const credential = readCredential(reader);
  const grantAmountWei = reader.ether("FAUCET_GRANT_AMOUNT_ETH", false);
  const minBalanceWei = reader.ether("FAUCET_MIN_BALANCE_ETH", true);
  const cooldownSecs = reader.integer("FAUCET_COOLDOWN_SECS", null);
  const maxInFlight = reader.integer("FAUCET_MAX_IN_FLIGHT", null, 1);
  const rpcTimeoutMs = reader.integer("FAUCET_RPC_TIMEOUT_MS", 10_000, 1);

  const config: FaucetConfig = {
    port: reader.integer("PORT", 8111),
    rpcUrl,
    chainId,
    credential,
    grantAmountWei,
    minBalanceWei,
    admission: {
      cooldownMs: cooldownSecs * 1000,
      maxInFlight
    },
    submitter: {
      retry: {
        maxAttempts: reader.integer("FAUCET_MAX_ATTEMPTS", 5, 1),
        baseDelayMs: reader.integer("FAUCET_BACKOFF_BASE_MS", 500),
        maxDelayMs: reader.integer("FAUCET_BACKOFF_MAX_MS", 8_000),
        feeBumpPercent: reader.integer("FAUCET_FEE_BUMP_PERCENT", 25)
      },
      rpcTimeoutMs,
      pollIntervalMs: reader.integer("FAUCET_POLL_INTERVAL_MS", 7_000, 1),
      confirmationTimeoutMs: reader.integer("FAUCET_CONFIRMATION_TIMEOUT_SECS", 300, 1) * 1000,
      statusRequeryLimit: reader.integer("FAUCET_STATUS_REQUERY_LIMIT", 3, 1)
    },
    ledger: {
      maxStateAgeMs: reader.integer("FAUCET_LEDGER_MAX_AGE_MS", 60_000),
      rpcTimeoutMs
    },
    clientTimeoutMs: reader.integer("FAUCET_CLIENT_TIMEOUT_MS", 30_000, 1),
    reconcileIntervalMs: reader.integer("FAUCET_RECONCILE_INTERVAL_MS", 30_000, 1),
    shutdownGraceMs: reader.integer("FAUCET_SHUTDOWN_GRACE_MS", 15_000),
    databasePath: reader.optional("FAUCET_DATABASE_PATH"),
    explorerTxUrl: reader.optional("FAUCET_EXPLORER_TX_URL"),
    gatewayKey: reader.optional("FAUCET_GATEWAY_KEY")
  };

  if (config.submitter.retry.maxDelayMs < config.submitter.retry.baseDelayMs) {
    reader.problems.push("invalid-env:FAUCET_BACKOFF_MAX_MS:must be >= FAUCET_BACKOFF_BASE_MS");
  }

  if (reader.problems.length > 0) {
    throw new ConfigError(reader.problems);
  }
  return config;
}
