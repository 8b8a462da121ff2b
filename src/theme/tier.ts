import { ColorValue, ScalarColor, is_tiered } from "./color"

/**
 * Display tier → position in a tiered color. Themes and hosts already depend
 * on these exact positions, so the table is fixed as is.
 */
export const TIER_FALLBACK: ReadonlyMap<number, number> = new Map([
    [256, 0],
    [1, 1],
    [16, 2],
    [2, 3],
    [8, 4],
    [3, 5],
])

/** `undefined` stands for a full color (GUI) display */
export type Tier = number | undefined

/**
 * The display tiers themes are exported and installed for, most capable
 * first. 256-color displays share the GUI entry, so they get no tier of
 * their own.
 */
export const DISPLAY_TIERS: readonly Tier[] = [undefined, 16, 8]

export type DisplayCapability =
    | { graphical: true }
    | { graphical: false; colors: number }

export function tier_index(tier?: Tier): number {
    if (tier === undefined) return 0
    return TIER_FALLBACK.get(tier) ?? 0
}

/** Picks the representation of `color` for `tier`, clamping to the last one */
export function pick_tier(
    color: ColorValue | undefined,
    tier?: Tier
): ScalarColor | undefined {
    if (color === undefined || !is_tiered(color)) return color
    if (color.length === 0) return undefined

    const index = tier_index(tier)
    return index > color.length - 1 ? color[color.length - 1] : color[index]
}

export function tier_for_display(display: DisplayCapability): Tier {
    if (display.graphical || display.colors > 256) return undefined
    if (display.colors >= 256) return 256
    if (display.colors >= 16) return 16
    if (display.colors >= 8) return 8
    return 2
}

export function tier_label(tier?: Tier): string {
    return tier === undefined ? "gui" : `${tier}`
}
