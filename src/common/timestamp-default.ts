/**
 * Column default for SQLite timestamps with millisecond precision.
 * datetime('now') keeps whole seconds, while Date query parameters are
 * written with milliseconds.
 */
export const nowWithMilliseconds = (): string => "STRFTIME('%Y-%m-%d %H:%M:%f', 'NOW')";
