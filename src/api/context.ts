import { FaucetService } from "../services/FaucetService";

export type FaucetApi = Pick<
  FaucetService,
  "requestDisbursement" | "getDisbursement" | "listDisbursements" | "healthStatus"
>;

export interface ApiContext {
  faucet: FaucetApi;
  /** True only for callers that presented the configured gateway key. */
  trustedGateway: boolean;
}
