/** Number of arena events kept for collaborators polling the log. */
export const EVENT_LOG_BUFFER_SIZE = 256;
