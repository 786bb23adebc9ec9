export { loadRunnerConfig, ConfigError } from "./runnerConfig";
export type { ConfigEnv } from "./runnerConfig";
