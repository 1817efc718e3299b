export * from "./bridge-fixtures.js";
export * from "./clock.js";
export * from "./factory.js";
export * from "./http.js";
export * from "./mqtt.js";
export * from "./timing.js";
