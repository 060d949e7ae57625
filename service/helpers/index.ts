export * from "./aggregate";
export * from "./archive";
export * from "./clean";
export * from "./dictionary";
export * from "./fs";
export * from "./labels";
export * from "./plugins";
export * from "./recordTypes";
