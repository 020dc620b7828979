export * from "./Config";
export * from "./Database";
export * from "./Records";
