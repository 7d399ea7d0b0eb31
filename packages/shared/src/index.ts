export * from "./config-path-resolver";
export * from "./runtime-defaults";
export * from "./schemas";
export * from "./types";
export * from "./utils";
export * from "./xdg";
