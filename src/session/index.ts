export { findLoginForm } from "./loginForm";
export type { LoginForm } from "./loginForm";
export { SessionManager } from "./sessionManager";
export type { SessionManagerDeps } from "./sessionManager";
export * from "./types";
