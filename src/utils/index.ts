export * from "./cancellation"
export * from "./dates"
export * from "./rate-limiter"
export * from "./retry"
