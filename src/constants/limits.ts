/** Hard platform limit for one outbound message */
export const MAX_MESSAGE_LENGTH = 2000;
/** Chunk size used when a reply exceeds MAX_MESSAGE_LENGTH (leaves headroom) */
export const MESSAGE_CHUNK_SIZE = 1900;
export const HISTORY_MAX_TURNS_PER_CHANNEL = 50;
export const TELEGRAM_CONNECTION_RETRIES = 5;
export const TELEGRAM_FLOOD_SLEEP_THRESHOLD = 60;
/** Handler file extensions picked up from the handler directory */
export const HANDLER_FILE_EXTENSIONS = [".js", ".mjs", ".cjs"] as const;
/** Exit code telling the supervisor to relaunch the process (EX_TEMPFAIL) */
export const RESTART_EXIT_CODE = 75;
