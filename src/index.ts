// Interview Coach Engine - Entry point
// Loads configuration and rules, wires the engine and starts the server.
// An invalid rules file stops the process before it accepts connections.

import "dotenv/config";
import path from "node:path";
import { createAppServer } from "./server.js";
import { CoachingEngine } from "./coaching-engine.js";
import { RuleConfigHandle, loadRuleConfigFile } from "./rule-config.js";
import { loadAppConfig } from "./config.js";
import { defaultLogger } from "./logger.js";
import { formatGuard } from "./guard.js";
import { errorMessage } from "./utils.js";

export const APP_NAME = "Interview Coach Engine";
export const APP_VERSION = "0.1.0";

const ts = () => new Date().toISOString();
const logInit = (msg: string) => console.log(`[INIT] [${ts()}] ${msg}`);
const logFatal = (msg: string) => console.error(`[FATAL] [${ts()}] ${msg}`);

const config = loadAppConfig(process.env, defaultLogger);
const rulesPath = path.resolve(process.cwd(), config.rulesPath);

// ─── Load coaching rules ────────────────────────────────────────────────────────

logInit(`Loading coaching rules from ${rulesPath}...`);

const rules = await loadRuleConfigFile(rulesPath).catch((err: unknown) => {
  logFatal(errorMessage(err));
  process.exit(1);
});

for (const state of rules.states) {
  logInit(
    `  state "${state.id}" priority=${state.priority} cooldown=${state.cooldownMs}ms guard: ${formatGuard(state.guard)}`,
  );
}
logInit(
  `Rules loaded: default "${rules.defaultStateId}", initial "${rules.initialStateId}", ` +
    `alpha=${rules.policy.smoothingAlpha}, overrideMargin=${rules.policy.overrideMargin}, ` +
    `history=${rules.policy.historyCapacity}`,
);

// ─── Wire engine and server ─────────────────────────────────────────────────────

const engine = new CoachingEngine({
  rules: new RuleConfigHandle(rules),
  logger: defaultLogger,
  fillerWords: config.fillerWords,
});

const server = createAppServer({
  engine,
  loadRules: () => loadRuleConfigFile(rulesPath),
  sessionIdleTimeoutMs: config.sessionIdleTimeoutMs,
  sessionSweepIntervalMs: config.sessionSweepIntervalMs,
});

const shutdown = (signal: string) => {
  logInit(`${signal} received, shutting down`);
  server.close().then(
    () => process.exit(0),
    (err: unknown) => {
      logFatal(`Shutdown failed: ${errorMessage(err)}`);
      process.exit(1);
    },
  );
};
process.once("SIGINT", () => shutdown("SIGINT"));
process.once("SIGTERM", () => shutdown("SIGTERM"));

await server.listen(config.port);
logInit(`${APP_NAME} v${APP_VERSION} running at http://localhost:${config.port}`);
logInit("Pipeline: raw sample → MetricNormalizer → ScoreAggregator → CoachingStateMachine");
