export {
  ConfigSchema,
  LOG_LEVELS,
  loadConfig,
  reasoningApiKey,
} from "./config.js";
export type { AppConfig } from "./config.js";
