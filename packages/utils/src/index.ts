export * from "./lib/log";
export * from "./lib/random-generator";
export * from "./lib/clock";
