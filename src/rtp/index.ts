export * from "./extensions.js";
export * from "./header.js";
export * from "./packet.js";
export * from "./wellKnown.js";
