/**
 * guardctl - WireGuard guard gateway orchestration
 * @module guardctl
 */

// Types
export * from "./types/index.js";

// Errors
export * from "./errors/index.js";

// Tags
export * from "./tags/index.js";

// Cloud
export * from "./cloud/index.js";

// Network
export * from "./network/index.js";

// Discovery
export * from "./discovery/index.js";

// Peering
export * from "./peering/index.js";

// Machine / Provider
export * from "./machine/index.js";
export * from "./provider/index.js";

// Engine
export * from "./engine/index.js";

// Guard ID / request validation
export * from "./guard/index.js";

// Cloud-init
export * from "./cloudinit/index.js";

// Config
export * from "./config/index.js";

// Logging
export { createLogger, logger } from "./logging/index.js";
export type { Logger, LoggerOptions } from "./logging/index.js";

export { VERSION } from "./version.js";
