export * from "./errors";
export * from "./table";
export * from "./types";
