export * from "./types/game";
export * from "./types/protocol";
export * from "./libs/Encoding";
export * from "./libs/Commands";
