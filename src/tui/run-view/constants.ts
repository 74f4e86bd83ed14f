export const SPINNER_FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];
export const SPINNER_INTERVAL_MS = 140;
export const LOG_TAIL_LINES = 12;
export const MAX_BUFFERED_LINES = 500;
export const DEFAULT_VIEW = "summary";
