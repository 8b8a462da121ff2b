import { ColorTable, build_color_table } from "./color_table"
import { default_faces } from "./default_faces"
import { CompiledFaces, compile_faces, merge_faces } from "./faces"
import {
    ThemeAppearance,
    ThemeConfig,
    ThemeOptions,
    ThemeSettings,
} from "./theme_config"

export interface Theme {
    name: string
    appearance: ThemeAppearance
    is_light: boolean
    options: Readonly<ThemeOptions>
    table: ColorTable
    faces: CompiledFaces
}

function resolve_options(
    defaults: ThemeOptions,
    overrides: Partial<ThemeOptions> = {}
): ThemeOptions {
    const options: ThemeOptions = { ...defaults }
    for (const [key, value] of Object.entries(overrides)) {
        if (value !== undefined) options[key] = value
    }
    return Object.freeze(options)
}

/**
 * Evaluates a theme's palette in order, then compiles the default faces
 * (with the theme's overrides merged in) against it.
 */
export function create_theme(
    theme: ThemeConfig,
    settings: ThemeSettings = {}
): Theme {
    const {
        name,
        appearance,
        palette,
        override: { faces: face_overrides = {} } = {},
    } = theme

    const options = resolve_options(theme.options, settings.options)
    const table = build_color_table(palette(options), {
        frame: settings.frame,
    })

    const faces = compile_faces(merge_faces(default_faces, face_overrides), table, {
        enable_bold: settings.enable_bold ?? theme.enable_bold ?? true,
        enable_italic: settings.enable_italic ?? theme.enable_italic ?? true,
    })

    return {
        name,
        appearance,
        is_light: appearance === ThemeAppearance.Light,
        options,
        table,
        faces,
    }
}
