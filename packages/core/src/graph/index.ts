export * from "./types"
export * from "./schema"
export * from "./builder"
export * from "./cycles"
export * from "./components"
