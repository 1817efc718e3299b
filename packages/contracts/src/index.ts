export * from "./schemas.js";
export * from "./messages/inbound-message.js";
export * from "./messages/outcome-record.js";
