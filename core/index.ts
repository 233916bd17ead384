export * from "./types";
export * from "./card";
export * from "./hand";
export * from "./rng";
export * from "./shoe";
export * from "./strategy";
export * from "./payout";
export * from "./game";
export * from "./stats";
export * from "./errors";
export * from "./config";
export * from "./roundLog";
export * from "./logger";
export * from "./session";
