import { DisplayFrame } from "./color"
import { PaletteDefinition } from "./color_table"
import { FaceSpecs } from "./faces"

/** Switches a theme offers, e.g. `brighter_comments` */
export type ThemeOptions = Record<string, boolean>

interface ThemeMeta {
    /** The name of the theme */
    name: string
    /** The theme's appearance. Either `light` or `dark`. */
    appearance: ThemeAppearance
    /** The author of the theme
     *
     * Ideally formatted as `Full Name <email>`
     */
    author: string
    /** SPDX License string
     *
     * Example: `MIT`
     */
    license_type?: string | ThemeLicenseType
    license_url?: string
}

export type ThemeFamilyMeta = Pick<
    ThemeMeta,
    "name" | "author" | "license_type" | "license_url"
>

/** Allow any attribute of a face to be overriden by the theme
 *
 * Example:
 * ```ts
 * override: {
 *   faces: {
 *     font_lock_comment_face: {
 *       slant: "italic",
 *     },
 *   },
 * }
 * ```
 */
interface ThemeConfigOverrides {
    faces?: FaceSpecs
}

type ThemeConfigProperties = ThemeMeta & {
    /** Defaults for the theme's switches */
    options: ThemeOptions
    /** Palette entries, in the order they are evaluated */
    palette: (options: Readonly<ThemeOptions>) => PaletteDefinition
    /** Defaults to `true` */
    enable_bold?: boolean
    /** Defaults to `true` */
    enable_italic?: boolean
    override?: ThemeConfigOverrides
}

export type ThemeConfig = {
    [K in keyof ThemeConfigProperties]: ThemeConfigProperties[K]
}

/** What the host chooses when it activates a theme */
export interface ThemeSettings {
    options?: Partial<ThemeOptions>
    enable_bold?: boolean
    enable_italic?: boolean
    frame?: DisplayFrame
}

export enum ThemeAppearance {
    Light = "light",
    Dark = "dark",
}

export enum ThemeLicenseType {
    MIT = "MIT",
    Apache2 = "Apache License 2.0",
}
