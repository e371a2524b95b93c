export * from "./protocol.js";
export * from "./providers.js";
