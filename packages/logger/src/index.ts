export { createLogger, type AppLogger, type LogSink } from "./create-logger.js";
