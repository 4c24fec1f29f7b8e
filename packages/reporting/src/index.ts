export * from "./diagnostics";
export * from "./errors";
export * from "./files";
export * from "./term";
