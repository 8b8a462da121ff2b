import chroma from "chroma-js"
import { InvalidColorError } from "./errors"

/** A hex string (`#rrggbb`) or a color name known to the display */
export type Color = string
/** Red, green and blue channels, each in [0, 1] */
export type RgbTriple = [number, number, number]
export type ScalarColor = Color | RgbTriple
/** Representations of one color, from the most capable display tier down */
export type TieredColor = ScalarColor[]
export type ColorValue = ScalarColor | TieredColor

/**
 * The display a color is normalized for. Terminals define some color names
 * themselves (`color-1`, `brightred`, ...); those go in `palette` and win
 * over the built-in CSS/X11 names.
 */
export interface DisplayFrame {
    palette?: Record<string, Color>
}

const MAX_INTENSITY = 255

export const BLACK: Color = "#000000"
export const WHITE: Color = "#ffffff"

export function is_rgb_triple(value: unknown): value is RgbTriple {
    return (
        Array.isArray(value) &&
        value.length === 3 &&
        value.every((channel) => typeof channel === "number")
    )
}

export function is_tiered(value: ColorValue): value is TieredColor {
    return Array.isArray(value) && !is_rgb_triple(value)
}

function parse_scalar(
    color: ScalarColor,
    frame?: DisplayFrame
): RgbTriple | undefined {
    if (is_rgb_triple(color)) {
        const in_range = color.every(
            (channel) => Number.isFinite(channel) && channel >= 0 && channel <= 1
        )
        return in_range ? [color[0], color[1], color[2]] : undefined
    }

    const palette = frame?.palette
    if (palette && Object.prototype.hasOwnProperty.call(palette, color)) {
        return parse_scalar(palette[color])
    }

    if (!chroma.valid(color)) return undefined

    const [r, g, b] = chroma(color).rgb()
    return [r / MAX_INTENSITY, g / MAX_INTENSITY, b / MAX_INTENSITY]
}

/** Converts a color to float channels in [0, 1] */
export function normalize(color: ScalarColor, frame?: DisplayFrame): RgbTriple {
    const rgb = parse_scalar(color, frame)
    if (!rgb) throw new InvalidColorError(color)
    return rgb
}

function format_hex([r, g, b]: RgbTriple): Color {
    const channel = (value: number) =>
        Math.min(MAX_INTENSITY, Math.max(0, Math.round(value * MAX_INTENSITY)))
    return chroma(channel(r), channel(g), channel(b)).hex("rgb")
}

export function to_hex(color: ScalarColor, frame?: DisplayFrame): Color {
    return format_hex(normalize(color, frame))
}

function blend_scalars(
    a: ScalarColor,
    b: ScalarColor,
    alpha: number,
    frame?: DisplayFrame
): ScalarColor {
    const from = parse_scalar(a, frame)
    const to = parse_scalar(b, frame)
    if (!from || !to) return a

    return format_hex([
        alpha * from[0] + (1 - alpha) * to[0],
        alpha * from[1] + (1 - alpha) * to[1],
        alpha * from[2] + (1 - alpha) * to[2],
    ])
}

// A scalar is reused at every position of the other side's sequence. When
// both sides are sequences the first one sets the length, and positions the
// second has no entry for are dropped.
function blend_tiers(
    a: ColorValue,
    b: ColorValue,
    alpha: number,
    frame?: DisplayFrame
): TieredColor {
    const length = is_tiered(a) ? a.length : is_tiered(b) ? b.length : 1
    const blended: TieredColor = []

    for (let ix = 0; ix < length; ix++) {
        if (is_tiered(b) && ix >= b.length) break
        const left = is_tiered(a) ? a[ix] : a
        const right = is_tiered(b) ? b[ix] : b
        blended.push(blend_scalars(left, right, alpha, frame))
    }

    return blended
}

/**
 * Mixes two colors channel by channel: `alpha * a + (1 - alpha) * b`.
 *
 * Sequences are blended position by position. If either color is missing, or
 * is not a color `normalize` understands, `a` is returned unchanged.
 */
export function blend(
    a: ColorValue | undefined,
    b: ColorValue | undefined,
    alpha: number,
    frame?: DisplayFrame
): ColorValue | undefined {
    if (a === undefined || b === undefined) return a
    if (is_tiered(a) || is_tiered(b)) return blend_tiers(a, b, alpha, frame)
    return blend_scalars(a, b, alpha, frame)
}

/** Moves `color` toward black by `alpha` (0 leaves it as is, 1 is black) */
export function darken(
    color: ColorValue | undefined,
    alpha: number,
    frame?: DisplayFrame
): ColorValue | undefined {
    return blend(color, BLACK, 1 - alpha, frame)
}

/** Moves `color` toward white by `alpha` (0 leaves it as is, 1 is white) */
export function lighten(
    color: ColorValue | undefined,
    alpha: number,
    frame?: DisplayFrame
): ColorValue | undefined {
    return blend(color, WHITE, 1 - alpha, frame)
}
