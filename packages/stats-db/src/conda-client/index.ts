export * from "./client/api";
export * from "./types/anaconda";
