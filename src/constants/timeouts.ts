export const HANDLER_RELOAD_CHECK_INTERVAL_MS = 5_000;
export const SENDER_FETCH_TIMEOUT_MS = 5_000;
export const SHUTDOWN_TIMEOUT_MS = 10_000;
