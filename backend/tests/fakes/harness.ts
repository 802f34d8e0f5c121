import { buildServices, type ServiceConfig } from "../../src/container";
import { FakeGateway, ManualClock, MemorySnapshotCache } from "./gateway";
import { createMemoryRepositories } from "./memory";

export const OWNER_ID = 1;

export const TEST_CONFIG: ServiceConfig = {
  OWNER_ID,
  APP_TIMEZONE: "UTC",
  LEADERBOARD_CACHE_TTL_SECONDS: 30,
  STORE_RETRY_ATTEMPTS: 3,
  STORE_RETRY_DELAY_MS: 0,
  DISPATCH_DELAY_MS: 0,
  POLL_RETENTION_DAYS: 7
};

export const QUESTION_BLOCK = [
  "Which organ produces insulin?",
  "Liver",
  "Pancreas",
  "Spleen",
  "Kidney",
  "B",
  "Beta cells of the islets secrete insulin."
].join("\n");

/** Every service wired to in-memory repositories, a fake gateway and a manual clock. */
export async function createHarness(config: Partial<ServiceConfig> = {}) {
  const repos = createMemoryRepositories();
  const gateway = new FakeGateway();
  const cache = new MemorySnapshotCache();
  const clock = new ManualClock(new Date("2024-05-01T10:00:00Z"));
  repos.state.now = () => clock.now();

  const services = await buildServices({
    repos,
    cache,
    gateway,
    clock,
    config: { ...TEST_CONFIG, ...config }
  });
  return { repos, state: repos.state, gateway, cache, clock, services };
}
