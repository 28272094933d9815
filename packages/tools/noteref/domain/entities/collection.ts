// Collection layout - where notes, indexes and the ledger live

export const DAILY_DIR = "#daily";
export const NOTE_DIR = "note";
export const DAILY_INDEX_FILE = "#daily.md";
export const DAILY_INDEX_HEADER = "# Daily Notes";
export const SOURCE_FILE = ".source";
export const DEFAULT_TASK_FILE = "TASK.md";

/** Prefix marking a root-level index file (tag files and the daily index). */
export const INDEX_FILE_PREFIX = "#";
