export * from "./bye.js";
export * from "./feedback.js";
export * from "./header.js";
export * from "./packet.js";
export * from "./receiverReport.js";
export * from "./reportBlock.js";
export * from "./sdes.js";
export * from "./senderReport.js";
export * from "./tcc/index.js";
