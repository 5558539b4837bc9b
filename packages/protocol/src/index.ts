// Action packet protocol: bit-level codec and packet layout.

export * from "./constants";
export * from "./utils/number";
export * from "./bit-stream-reader";
export * from "./bit-stream-writer";
export * from "./action-category";
export * from "./action-packet";
export * from "./action-packet-encoder";
