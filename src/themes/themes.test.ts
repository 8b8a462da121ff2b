import {
    REQUIRED_PALETTE_NAMES,
    ThemeConfig,
    create_theme,
    face_attribute,
    resolve_face,
    tier_for_display,
} from "../theme"
import { theme as one_dark } from "./one/one-dark"
import { themes } from "./index"
import { describe, it, expect } from "vitest"

describe("bundled themes", () => {
    it.each(themes.map((theme): [string, ThemeConfig] => [theme.name, theme]))(
        "%s defines every palette name the default faces use",
        (_name, config) => {
            const theme = create_theme(config)

            for (const name of REQUIRED_PALETTE_NAMES) {
                expect(theme.table.has(name), name).toBe(true)
            }
        }
    )

    it("applies One Dark's face overrides", () => {
        const theme = create_theme(one_dark)

        expect(resolve_face(theme.faces, "font_lock_comment_face")).toEqual({
            foreground: "#545862",
            slant: "italic",
        })
        expect(resolve_face(theme.faces, "line_number_current_line")).toEqual({
            inherit: ["hl_line", "default"],
            foreground: "#74ade9",
        })
        expect(
            face_attribute(theme.faces, "line_number_current_line", "background")
        ).toBe(theme.table.resolve("bg_alt"))
    })

    it("gives 256-color terminals the full color palette", () => {
        const theme = create_theme(one_dark)
        const xterm_256 = tier_for_display({ graphical: false, colors: 256 })
        const xterm_16 = tier_for_display({ graphical: false, colors: 16 })

        expect(theme.table.resolve("bg", xterm_256)).toBe("#282c34")
        expect(theme.table.resolve("blue", xterm_256)).toBe("#74ade9")
        expect(theme.table.resolve("bg", xterm_16)).toBe("black")
        expect(theme.table.resolve("blue", xterm_16)).toBe("blue")
    })

    it("switches palette entries with theme options", () => {
        const plain = create_theme(one_dark)
        const bright = create_theme(one_dark, {
            options: { brighter_modeline: true },
        })

        expect(plain.table.resolve("modeline_bg_inactive")).toBe("#21252b")
        expect(bright.table.resolve("modeline_bg_inactive")).not.toBe("#21252b")
    })

    it("marks light themes", () => {
        expect(themes.map((theme) => create_theme(theme).is_light)).toEqual([
            false,
            true,
        ])
    })
})
