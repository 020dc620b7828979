export * from "./Live";
export * from "./Test";
