export type { JsonValue, SessionBackend } from "./backend.js";
export { SqliteSessionBackend, type SqliteSessionBackendOptions } from "./sqlite-backend.js";
export { Session, SessionManager, session, sessionId } from "./session.js";
export { SessionCollector, type SessionCollectorOptions } from "./collector.js";
