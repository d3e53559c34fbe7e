export * from "./conda";
