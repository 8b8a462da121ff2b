import { ColorValue, DisplayFrame, ScalarColor, is_tiered } from "./color"
import { BUILDER_SEALED_ERROR } from "./errors"
import { ColorExpression, ColorInput, evaluate, to_expression } from "./expression"
import { Tier, pick_tier } from "./tier"

/** An ordered palette: later entries may reference earlier ones by name */
export type PaletteDefinition = [name: string, color: ColorInput][]

export interface ColorTableOptions {
    frame?: DisplayFrame
}

/** A finished palette. Never changes once built. */
export class ColorTable {
    private readonly entries: ReadonlyMap<string, ColorValue>

    constructor(entries: Map<string, ColorValue>, readonly frame?: DisplayFrame) {
        this.entries = new Map(entries)
    }

    has(name: string): boolean {
        return this.entries.has(name)
    }

    /** The stored value. Tiered colors and triples come back frozen. */
    get(name: string): ColorValue | undefined {
        return this.entries.get(name)
    }

    names(): string[] {
        return [...this.entries.keys()]
    }

    /**
     * The color stored under `name` for a display tier. Scalars are returned
     * for every tier; tiered colors go through the tier fallback table.
     */
    resolve(name: string, tier?: Tier): ScalarColor | undefined {
        return pick_tier(this.entries.get(name), tier)
    }

    /** Evaluates an expression against this palette without changing it */
    evaluate(expression: ColorInput, definition = "<expression>"): ColorValue {
        return evaluate(to_expression(expression), {
            definition,
            has: (name) => this.entries.has(name),
            lookup: (name) => this.entries.get(name),
            frame: this.frame,
        })
    }
}

function freeze_color(value: ColorValue): ColorValue {
    if (is_tiered(value)) value.forEach(freeze_color)
    if (Array.isArray(value)) Object.freeze(value)
    return value
}

export class ColorTableBuilder {
    private readonly entries = new Map<string, ColorValue>()
    private sealed = false

    constructor(private readonly options: ColorTableOptions = {}) {}

    /**
     * Evaluates `color` against the entries defined so far and stores it under
     * `name`. Nothing is stored when evaluation throws.
     */
    define(name: string, color: ColorInput): ColorValue {
        if (this.sealed) throw new Error(BUILDER_SEALED_ERROR)

        const expression: ColorExpression = to_expression(color)
        const value = evaluate(expression, {
            definition: name,
            has: (key) => this.entries.has(key),
            lookup: (key) => this.entries.get(key),
            frame: this.options.frame,
        })

        this.entries.set(name, freeze_color(value))
        return value
    }

    build(): ColorTable {
        this.sealed = true
        return new ColorTable(this.entries, this.options.frame)
    }
}

export function build_color_table(
    palette: PaletteDefinition,
    options: ColorTableOptions = {}
): ColorTable {
    const builder = new ColorTableBuilder(options)
    for (const [name, color] of palette) {
        builder.define(name, color)
    }
    return builder.build()
}
