export * from "./crypto/hash.js";
export * from "./auth/request-auth.js";
export * from "./auth/roles.js";
export * from "./address.js";
export * from "./errors.js";
export * from "./types/domain.js";
export * from "./types/events.js";
export * from "./types/api.js";
