// Snapshot model and validation
export * from "./snapshot"

// Relationship extractors
export * from "./extractors"

// Graph, cycles
export * from "./graph"

// Phases and duration
export * from "./schedule"

// Pipeline and report
export * from "./pipeline"

// Compose loader
export * from "./parsers"

// Config
export * from "./config"

// Diagnostics, errors, logging
export * from "./diagnostics"
export * from "./errors"
export * from "./logger"
