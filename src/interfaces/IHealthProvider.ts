import { HealthStatus } from "../types/health.types";

/** What the HTTP listener needs to answer /healthcheck. */
export interface IHealthProvider {
  healthStatus(): Promise<HealthStatus>;
}
