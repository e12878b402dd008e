// lib/sheet-presets.ts
export type SheetSizeMm = { widthMm: number; heightMm: number }

export const SHEET_SIZES = {
  A4: { widthMm: 210, heightMm: 297 },
} as const satisfies Record<string, SheetSizeMm>

export type SheetName = keyof typeof SHEET_SIZES

export type BadgePreset = {
  name: string
  /** Visible badge face. */
  badgeSizeMm: number
  /** Extra ring folded around the badge edge, added on each side. */
  bleedMm: number
}

export const BADGE_PRESETS = {
  small: { name: "Small badge", badgeSizeMm: 32, bleedMm: 5 },
  standard: { name: "Standard badge", badgeSizeMm: 58, bleedMm: 5 },
  large: { name: "Large badge", badgeSizeMm: 75, bleedMm: 5 },
} as const satisfies Record<string, BadgePreset>

/** Printed diameter of a badge: face plus bleed on both sides. */
export const getPrintedDiameterMm = (preset: Omit<BadgePreset, "name">) =>
  preset.badgeSizeMm + 2 * preset.bleedMm
