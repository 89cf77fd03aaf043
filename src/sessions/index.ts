export { SessionManager, InMemorySessionStore } from "./sessionManager";
