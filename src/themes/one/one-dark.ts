import {
    blended,
    darkened,
    font_slants,
    font_weights,
    lightened,
    ref,
    tiered,
    ThemeAppearance,
    ThemeConfig,
    ThemeLicenseType,
} from "../../common"

export const theme: ThemeConfig = {
    name: "One Dark",
    author: "palettesmith contributors",
    appearance: ThemeAppearance.Dark,
    license_type: ThemeLicenseType.MIT,
    options: {
        brighter_comments: false,
        brighter_modeline: false,
    },
    palette: (options) => {
        const comment = options.brighter_comments ? ref("dark_cyan") : ref("base5")

        return [
            // [GUI and 256 colors, 16 colors and fewer]
            ["bg", ["#282c34", "black"]],
            ["bg_alt", ["#21252b", "black"]],
            ["fg", ["#abb2bf", "white"]],
            ["fg_alt", ["#5d636f", "gray"]],

            ["base0", ["#1b1f23", "black"]],
            ["base1", ["#1e2228", "black"]],
            ["base2", ["#202328", "black"]],
            ["base3", ["#353b45", "darkgray"]],
            ["base4", ["#3e4451", "darkgray"]],
            ["base5", ["#545862", "darkgray"]],
            ["base6", ["#565c64", "gray"]],
            ["base7", ["#b6bdca", "gray"]],
            ["base8", ["#c8ccd4", "white"]],

            ["grey", ref("base4")],
            ["red", ["#d07277", "red"]],
            ["orange", ["#c0966b", "orange"]],
            ["green", ["#a1c181", "green"]],
            ["teal", ["#6fb4c0", "teal"]],
            ["yellow", ["#dfc184", "yellow"]],
            ["blue", ["#74ade9", "blue"]],
            ["dark_blue", ["#2257a0", "blue"]],
            ["magenta", ["#b478cf", "magenta"]],
            ["violet", ["#a9a1e1", "violet"]],
            ["cyan", ["#46d9ff", "cyan"]],
            ["dark_cyan", ["#5699af", "cyan"]],

            ["highlight", ref("blue")],
            ["vertical_bar", darkened(ref("base1"), 0.1)],
            ["selection", ref("dark_blue")],
            ["builtin", ref("magenta")],
            ["comments", comment],
            ["doc_comments", lightened(comment, 0.25)],
            ["constants", ref("violet")],
            ["functions", ref("magenta")],
            ["keywords", ref("blue")],
            ["methods", ref("cyan")],
            ["operators", ref("blue")],
            ["type", ref("yellow")],
            ["strings", ref("green")],
            ["variables", lightened(ref("magenta"), 0.4)],
            ["numbers", ref("orange")],
            ["region", tiered(lightened(ref("bg_alt"), 0.15), ref("base3"))],
            ["error", ref("red")],
            ["warning", ref("yellow")],
            ["success", ref("green")],
            ["vc_modified", ref("orange")],
            ["vc_added", ref("green")],
            ["vc_deleted", ref("red")],

            ["modeline_fg", ref("fg")],
            ["modeline_fg_alt", ref("base5")],
            [
                "modeline_bg",
                options.brighter_modeline
                    ? darkened(ref("blue"), 0.45)
                    : darkened(ref("bg_alt"), 0.1),
            ],
            [
                "modeline_bg_inactive",
                options.brighter_modeline
                    ? blended(ref("blue"), ref("bg_alt"), 0.2)
                    : ref("bg_alt"),
            ],
        ]
    },
    override: {
        faces: {
            font_lock_comment_face: { slant: font_slants.italic },
            font_lock_keyword_face: { weight: font_weights.bold },
            line_number_current_line: { foreground: ref("blue") },
        },
    },
}
