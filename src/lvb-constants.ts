/**
 * Layout constants of the LVB gimmick container.
 * Kept in one place so a new game revision only needs changes here.
 */

/** File signature at offset 0 ("LVLB") */
export const LVB_MAGIC = Buffer.from([0x4C, 0x56, 0x4C, 0x42]);

/** Size of the file header; sections start right after it */
export const FILE_HEADER_SIZE = 32;

/** Size of every section header; entries start right after it */
export const SECTION_HEADER_SIZE = 32;

/** Format versions at or above this use the modern Info layout */
export const MODERN_FORMAT_VERSION = 5;

/**
 * Section magics with a fixed meaning inside the container.
 * They hold the shared tables and are not gimmick sections themselves.
 */
export const SECTION_MAGIC = {
  /** Per-gimmick info records */
  INFO: 'INFO',
  /** 4x4 transform matrices */
  XFRM: 'XFRM',
  /** Debug names (modern format only) */
  DEBI: 'DEBI',
  /** String blob */
  STRG: 'STRG',
} as const;

export const SPECIAL_MAGICS: readonly string[] = Object.values(SECTION_MAGIC);

/**
 * Minimum entry sizes (bytes) of the fixed payload layouts.
 */
export const PAYLOAD_SIZE = {
  INFO: 16,
  LEGACY_INFO: 16,
  XFRM: 64,
  DEBI: 16,
} as const;
