/**
 * Text overlay frame used by the bundled mock plugins: each plugin that
 * renders appends one line.
 */
export type TextFrame = readonly string[];
