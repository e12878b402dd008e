// layout.config.ts
/**
 * Tunable constants for badge sheet layout.
 * Kept at the top level so the packing heuristics can be adjusted without
 * touching the solvers.
 */

export const LAYOUT_CONFIG = {
  /**
   * Fraction of the requested spacing that the uniform column search will
   * accept between columns in exchange for one more column.
   *
   * 1.0: columns always keep the full requested gap
   * 0.5: a column may be added when the gaps shrink to half the request
   */
  UNIFORM_MIN_SPACING_RATIO: 0.5,

  /**
   * When the hexagonal and uniform column counts are equal, the uniform
   * (centered) arrangement wins. Set to true to prefer hex on ties.
   */
  PREFER_HEX_ON_TIE: false,

  /**
   * The honeycomb can place fewer items than the plain grid for some
   * diameter/margin combinations. When enabled, compact mode then returns
   * the grid arrangement so it never holds fewer items per sheet.
   */
  GRID_FALLBACK: true,

  /** Print resolution used for every mm to px conversion. */
  PRINT_DPI: 300,

  DEFAULT_SPACING_MM: 3,
  DEFAULT_MARGIN_MM: 6,
}

/**
 * Ranges the settings owner clamps user input into before building a
 * geometry for the engine.
 */
export const SETTING_LIMITS = {
  BADGE_SIZE_MM: { min: 10, max: 100 },
  BLEED_MM: { min: 0, max: 10 },
  MARGIN_MM: { min: 5, max: 30 },
  SPACING_MM: { min: 0, max: Infinity },
} as const
