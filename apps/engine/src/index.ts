// @cogwatch/engine

export * from "./errors";
export * from "./logger";
export * from "./util";
export * from "./config/ssot";
export * from "./series/reader";
export * from "./features/rolling";
export * from "./features/extractor";
export * from "./features/export";
export * from "./classifier/models";
export * from "./classifier/state_classifier";
export * from "./playback/controller";
export * from "./playback/session";
export * from "./pipeline";
export * from "./runtime";
export * from "./routes";
export * from "./sse";
