export * from "./config"
export * from "./extractor"
export * from "./locators"
export * from "./navigator"
export * from "./orchestrator"
export * from "./parsing"
export * from "./session"
export * from "./session-playwright"
export * from "./ui-state"
