export * from "./census-types";
export * from "./collaborator-types";
