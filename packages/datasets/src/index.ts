export * from "./lib/generator";
export * from "./lib/analyzer";
export * from "./lib/recommendation";
