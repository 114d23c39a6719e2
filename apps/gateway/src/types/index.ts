export * from "./notifications.js";
export * from "./envelope.js";
