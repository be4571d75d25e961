export * from "./const.js";
export * as convert from "./convert.js";
export * from "./demux.js";
export * from "./exceptions.js";
export * from "./rtcp/index.js";
export * from "./rtp/index.js";
export * from "./settings.js";
export * from "./support/index.js";
export * from "./sync.js";
