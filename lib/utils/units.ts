// lib/utils/units.ts
import { LAYOUT_CONFIG } from "../../layout.config"

export const MM_PER_INCH = 25.4

/** Truncates toward zero, matching how print canvases are sized. */
export const mmToPixels = (mm: number, dpi: number = LAYOUT_CONFIG.PRINT_DPI) =>
  Math.trunc((mm * dpi) / MM_PER_INCH)

export const pixelsToMm = (
  pixels: number,
  dpi: number = LAYOUT_CONFIG.PRINT_DPI,
) => (pixels * MM_PER_INCH) / dpi
