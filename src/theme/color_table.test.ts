import { is_tiered } from "./color"
import { ColorTableBuilder, build_color_table } from "./color_table"
import {
    BUILDER_SEALED_ERROR,
    InvalidColorError,
    UndefinedReferenceError,
} from "./errors"
import { blended, darkened, lightened, ref, references, tiered } from "./expression"
import { describe, it, expect } from "vitest"

describe("ColorTableBuilder", () => {
    it("evaluates definitions against earlier entries", () => {
        const builder = new ColorTableBuilder()
        builder.define("base", "#282c34")
        builder.define("bg", "#21252b")
        builder.define("fringe", blended(ref("base"), ref("bg"), 0.5))
        builder.define("highlight", darkened("#ffffff", 0.8))

        const table = builder.build()

        expect(table.resolve("fringe")).toBe("#252930")
        expect(table.resolve("highlight")).toBe("#333333")
        expect(table.names()).toEqual(["base", "bg", "fringe", "highlight"])
    })

    it("rejects references to names that are not defined yet", () => {
        const builder = new ColorTableBuilder()
        builder.define("bg", "#000000")

        let error: unknown
        try {
            builder.define("fg", lightened(ref("base"), 0.5))
        } catch (e) {
            error = e
        }

        expect(error).toBeInstanceOf(UndefinedReferenceError)
        expect(error).toMatchObject({
            kind: "UndefinedReference",
            reference: "base",
            definition: "fg",
        })

        const table = builder.build()
        expect(table.has("fg")).toBe(false)
        expect(table.names()).toEqual(["bg"])
    })

    it("rejects literals that are not colors", () => {
        const builder = new ColorTableBuilder()

        expect(() => builder.define("bg", "unspecified")).toThrow(
            InvalidColorError
        )
        expect(() => builder.define("bg", ["#000000", "nope"])).toThrow(
            InvalidColorError
        )
    })

    it("can not be extended once built", () => {
        const builder = new ColorTableBuilder()
        builder.build()

        expect(() => builder.define("bg", "#000000")).toThrow(
            BUILDER_SEALED_ERROR
        )
    })

    it("understands names from the display frame", () => {
        const table = build_color_table(
            [
                ["bg", "color-0"],
                ["bg_alt", blended(ref("bg"), "#ffffff", 1)],
            ],
            { frame: { palette: { "color-0": "#1c1c1c" } } }
        )

        expect(table.get("bg")).toBe("color-0")
        expect(table.get("bg_alt")).toBe("#1c1c1c")
    })
})

describe("build_color_table", () => {
    it("fails on forward references", () => {
        expect(() =>
            build_color_table([
                ["fg", ref("bg")],
                ["bg", "#000000"],
            ])
        ).toThrow(UndefinedReferenceError)
    })

    it("lets a redefinition shadow the earlier value for later entries", () => {
        const table = build_color_table([
            ["accent", "#000000"],
            ["border", ref("accent")],
            ["accent", "#ffffff"],
        ])

        expect(table.get("border")).toBe("#000000")
        expect(table.get("accent")).toBe("#ffffff")
    })

    it("builds tiered colors out of parts", () => {
        const table = build_color_table([
            ["red", ["#ff0000", "#d75f5f", "red"]],
            ["alert", tiered(ref("red"), "#aa0000", "maroon")],
            ["muted", tiered("#111111", ref("red"))],
        ])

        expect(table.get("alert")).toEqual(["#ff0000", "#aa0000", "maroon"])
        expect(table.get("muted")).toEqual(["#111111", "#d75f5f"])
    })

    it("blends tiered entries position by position", () => {
        const table = build_color_table([
            ["bg", ["#ffffff", "#808080"]],
            ["shadow", darkened(ref("bg"), 0.5)],
        ])

        expect(table.get("shadow")).toEqual(["#808080", "#404040"])
    })
})

describe("ColorTable", () => {
    const table = build_color_table([
        ["bg", "#21252b"],
        ["red", ["#ff0000", "#aa0000", "#880000"]],
    ])

    it("returns scalars for every tier", () => {
        expect(table.resolve("bg")).toBe("#21252b")
        expect(table.resolve("bg", 16)).toBe("#21252b")
    })

    it("clamps tiers past the end to the last entry", () => {
        expect(table.resolve("red", 1)).toBe("#aa0000")
        expect(table.resolve("red", 3)).toBe("#880000")
    })

    it("returns undefined for names it does not define", () => {
        expect(table.resolve("missing")).toBeUndefined()
        expect(table.resolve("missing", 16)).toBeUndefined()
    })

    it("evaluates expressions without adding entries", () => {
        expect(table.evaluate(darkened(ref("red"), 1))).toEqual([
            "#000000",
            "#000000",
            "#000000",
        ])
        expect(table.names()).toEqual(["bg", "red"])
    })
})

describe("table immutability", () => {
    it("ignores later changes to the palette's own arrays", () => {
        const red = ["#ff0000", "#aa0000", "#880000"]
        const table = build_color_table([["red", red]])

        red[0] = "#00ff00"

        expect(table.resolve("red")).toBe("#ff0000")
    })

    it("hands out stored colors that cannot be changed", () => {
        const table = build_color_table([["red", ["#ff0000", "red"]]])
        const stored = table.get("red")
        if (stored === undefined || !is_tiered(stored)) {
            throw new Error("expected a tiered color")
        }

        expect(Object.isFrozen(stored)).toBe(true)
        expect(() => {
            stored[0] = "#00ff00"
        }).toThrow(TypeError)
        expect(table.resolve("red")).toBe("#ff0000")
    })

    it("copies rgb triples", () => {
        const triple: [number, number, number] = [1, 0, 0]
        const table = build_color_table([["red", triple]])

        triple[1] = 1

        expect(table.get("red")).toEqual([1, 0, 0])
        expect(table.resolve("red")).toEqual([1, 0, 0])
    })
})

describe("references", () => {
    it("lists the names an expression reads", () => {
        expect(
            references(blended(ref("a"), darkened(tiered(ref("b"), "#000000"), 0.1), 0.5))
        ).toEqual(["a", "b"])
    })
})
