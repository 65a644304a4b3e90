export * from "./controllers/index.js";
export * from "./crypto/index.js";
export * from "./errors/index.js";
export * from "./messenger/index.js";
export * from "./protocol/index.js";
export * from "./runtime/index.js";
export * from "./services/activityLog/index.js";
export * from "./utils/logger.js";
export * from "./utils/password.js";
export * from "./utils/username.js";
export * from "./vault/index.js";
