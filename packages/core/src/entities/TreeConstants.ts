/**
 * Configuration constants for tree operations
 *
 * Centralises glyph tables and display defaults used across the tree
 * implementation.
 */

/**
 * Line glyphs per style: vertical bar, box (non-last sibling), corner (last sibling)
 */
export const LINE_STYLES = {
  ascii: ['|', '|-- ', '+-- '],
  'ascii-ex': ['│', '├── ', '└── '],
  'ascii-exr': ['│', '├── ', '╰── '],
  'ascii-em': ['║', '╠══ ', '╚══ '],
  'ascii-emv': ['║', '╟── ', '╙── '],
  'ascii-emh': ['│', '╞══ ', '╘══ '],
} as const satisfies Record<string, readonly [string, string, string]>;

export type LineType = keyof typeof LINE_STYLES;

export function isLineType(value: string): value is LineType {
  return Object.hasOwn(LINE_STYLES, value);
}

/**
 * Display configuration constants
 */
export const DISPLAY_CONFIG = {
  /** Separator between a child's key and its representation */
  DEFAULT_KEY_DELIMITER: ': ',

  /** Marker appended when a line has to be cut */
  ELLIPSIS: '...',

  /** Representation of keyed (map) nodes */
  KEYED_REPR: '{}',

  /** Representation of unkeyed (list) nodes */
  UNKEYED_REPR: '[]',
} as const;

/**
 * Tree validation configuration constants
 */
export const VALIDATION_CONFIG = {
  /** Default maximum depth before a deep nesting warning is raised */
  DEFAULT_MAX_DEPTH: 100,
} as const;
