// lib/utils/resolveBadgeSettings.ts
import { LAYOUT_CONFIG, SETTING_LIMITS } from "../../layout.config"
import { getPrintedDiameterMm } from "../sheet-presets"
import { clamp } from "./layout-geometry"

export type BadgeSettingsInput = {
  badgeSizeMm: number
  bleedMm?: number
  marginMm?: number
  spacingMm?: number
}

export type BadgeSettings = Readonly<{
  badgeSizeMm: number
  bleedMm: number
  itemDiameterMm: number
  marginMm: number
  spacingMm: number
}>

/**
 * Clamps user-facing settings into the ranges the editor allows. The layout
 * engine itself does not re-validate these values.
 */
export function resolveBadgeSettings(input: BadgeSettingsInput): BadgeSettings {
  const limits = SETTING_LIMITS
  const badgeSizeMm = clamp(
    input.badgeSizeMm,
    limits.BADGE_SIZE_MM.min,
    limits.BADGE_SIZE_MM.max,
  )
  const bleedMm = clamp(input.bleedMm ?? 0, limits.BLEED_MM.min, limits.BLEED_MM.max)
  const marginMm = clamp(
    input.marginMm ?? LAYOUT_CONFIG.DEFAULT_MARGIN_MM,
    limits.MARGIN_MM.min,
    limits.MARGIN_MM.max,
  )
  const spacingMm = clamp(
    input.spacingMm ?? LAYOUT_CONFIG.DEFAULT_SPACING_MM,
    limits.SPACING_MM.min,
    limits.SPACING_MM.max,
  )

  return {
    badgeSizeMm,
    bleedMm,
    itemDiameterMm: getPrintedDiameterMm({ badgeSizeMm, bleedMm }),
    marginMm,
    spacingMm,
  }
}
