export * from "./types"
export * from "./phases"
export * from "./duration"
