import {
    blended,
    darkened,
    lightened,
    ref,
    ThemeAppearance,
    ThemeConfig,
    ThemeLicenseType,
} from "../../common"

export const theme: ThemeConfig = {
    name: "One Light",
    author: "palettesmith contributors",
    appearance: ThemeAppearance.Light,
    license_type: ThemeLicenseType.MIT,
    options: {
        brighter_modeline: false,
    },
    palette: (options) => [
        ["bg", ["#fafafa", "white"]],
        ["bg_alt", ["#f0f0f0", "white"]],
        ["fg", ["#383a42", "black"]],
        ["fg_alt", ["#c6c7c7", "gray"]],

        ["base0", ["#f0f0f0", "white"]],
        ["base1", ["#e7e7e7", "white"]],
        ["base2", ["#dfdfdf", "white"]],
        ["base3", ["#c6c7c7", "silver"]],
        ["base4", ["#9ca0a4", "silver"]],
        ["base5", ["#383a42", "gray"]],
        ["base6", ["#202328", "darkgray"]],
        ["base7", ["#1c1f24", "black"]],
        ["base8", ["#1b2229", "black"]],

        ["grey", ref("base4")],
        ["red", ["#e45649", "red"]],
        ["orange", ["#ad6f26", "orange"]],
        ["green", ["#50a14f", "green"]],
        ["teal", ["#4db5bd", "teal"]],
        ["yellow", ["#986801", "olive"]],
        ["blue", ["#4078f2", "blue"]],
        ["dark_blue", ["#a0bcf8", "blue"]],
        ["magenta", ["#a626a4", "magenta"]],
        ["violet", ["#b751b6", "purple"]],
        ["cyan", ["#0184bc", "teal"]],
        ["dark_cyan", ["#005478", "teal"]],

        ["highlight", ref("blue")],
        ["vertical_bar", ref("base2")],
        ["selection", ref("dark_blue")],
        ["builtin", ref("magenta")],
        ["comments", ref("base4")],
        ["doc_comments", darkened(ref("base4"), 0.25)],
        ["constants", ref("violet")],
        ["functions", ref("magenta")],
        ["keywords", ref("red")],
        ["methods", ref("cyan")],
        ["operators", ref("blue")],
        ["type", ref("yellow")],
        ["strings", ref("green")],
        ["variables", darkened(ref("magenta"), 0.36)],
        ["numbers", ref("orange")],
        ["region", darkened(ref("bg_alt"), 0.1)],
        ["error", ref("red")],
        ["warning", ref("yellow")],
        ["success", ref("green")],
        ["vc_modified", ref("orange")],
        ["vc_added", ref("green")],
        ["vc_deleted", ref("red")],

        ["modeline_fg", ref("fg")],
        ["modeline_fg_alt", ref("base4")],
        [
            "modeline_bg",
            options.brighter_modeline
                ? blended(ref("blue"), ref("bg"), 0.2)
                : darkened(ref("bg_alt"), 0.1),
        ],
        [
            "modeline_bg_inactive",
            options.brighter_modeline
                ? lightened(ref("blue"), 0.85)
                : ref("bg_alt"),
        ],
    ],
}
