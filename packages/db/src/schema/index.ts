export * from "./family";
