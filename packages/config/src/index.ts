export { loadConfig, ConfigValidationError } from "./load-config.js";
export { configSchema, type AppConfig } from "./schema.js";
