export { version } from "./version";
export * from "./table";
