import deepmerge from "deepmerge"
import { ColorValue, ScalarColor } from "./color"
import { ColorTable } from "./color_table"
import { ColorInput } from "./expression"
import { DISPLAY_TIERS, Tier, pick_tier } from "./tier"

export type FontWeight = "normal" | "bold"
export type FontSlant = "normal" | "italic"

/** How a face looks, with colors written against the theme's palette */
export interface FaceSpec {
    inherit?: string | string[]
    foreground?: ColorInput
    background?: ColorInput
    distant_foreground?: ColorInput
    weight?: FontWeight
    slant?: FontSlant
    underline?: boolean | ColorInput
    strike_through?: boolean
    /** Paint the background to the edge of the window */
    extend?: boolean
}

export type FaceSpecs = Record<string, FaceSpec>

interface FaceAttributes<C> {
    inherit?: string[]
    foreground?: C
    background?: C
    distant_foreground?: C
    weight?: FontWeight
    slant?: FontSlant
    underline?: boolean | C
    strike_through?: boolean
    extend?: boolean
}

export type CompiledFace = FaceAttributes<ColorValue>
export type ResolvedFace = FaceAttributes<ScalarColor>
export type FaceAttribute = Exclude<keyof ResolvedFace, "inherit">

export interface FaceOptions {
    enable_bold: boolean
    enable_italic: boolean
}

export interface CompiledFaces extends FaceOptions {
    faces: ReadonlyMap<string, CompiledFace>
}

/** One entry of a face's display-conditional spec */
export interface DisplaySpec {
    display: { min_colors: number }
    attributes: ResolvedFace
}

const COLOR_ATTRIBUTES = [
    "foreground",
    "background",
    "distant_foreground",
] as const

// Color expressions and arrays are values, not containers to merge into
const is_mergeable_face_object = (value: object): boolean =>
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    !("kind" in value)

/**
 * Merges a theme's face overrides over a base set. Each attribute an
 * override sets replaces the base attribute; faces only present in the
 * overrides are added.
 */
export function merge_faces(base: FaceSpecs, overrides: FaceSpecs): FaceSpecs {
    return deepmerge<FaceSpecs>(base, overrides, {
        isMergeableObject: is_mergeable_face_object,
    })
}

function compile_face(
    name: string,
    spec: FaceSpec,
    table: ColorTable
): CompiledFace {
    const face: CompiledFace = {}

    if (spec.inherit !== undefined) {
        face.inherit = Array.isArray(spec.inherit)
            ? [...spec.inherit]
            : [spec.inherit]
    }

    for (const attribute of COLOR_ATTRIBUTES) {
        const color = spec[attribute]
        if (color !== undefined) face[attribute] = table.evaluate(color, name)
    }

    if (spec.underline !== undefined) {
        face.underline =
            typeof spec.underline === "boolean"
                ? spec.underline
                : table.evaluate(spec.underline, name)
    }

    if (spec.weight !== undefined) face.weight = spec.weight
    if (spec.slant !== undefined) face.slant = spec.slant
    if (spec.strike_through !== undefined) {
        face.strike_through = spec.strike_through
    }
    if (spec.extend !== undefined) face.extend = spec.extend

    return face
}

/** Evaluates every face's colors against a palette */
export function compile_faces(
    specs: FaceSpecs,
    table: ColorTable,
    options: FaceOptions
): CompiledFaces {
    const faces = new Map<string, CompiledFace>()
    for (const [name, spec] of Object.entries(specs)) {
        faces.set(name, compile_face(name, spec, table))
    }
    return { ...options, faces }
}

export function resolve_face(
    compiled: CompiledFaces,
    name: string,
    tier?: Tier
): ResolvedFace | undefined {
    const face = compiled.faces.get(name)
    if (!face) return undefined

    const resolved: ResolvedFace = {}

    if (face.inherit) resolved.inherit = [...face.inherit]

    for (const attribute of COLOR_ATTRIBUTES) {
        const color = pick_tier(face[attribute], tier)
        if (color !== undefined) resolved[attribute] = color
    }

    if (face.underline !== undefined) {
        const underline =
            typeof face.underline === "boolean"
                ? face.underline
                : pick_tier(face.underline, tier)
        if (underline !== undefined) resolved.underline = underline
    }

    if (face.weight !== undefined) {
        resolved.weight =
            face.weight === "bold" && !compiled.enable_bold ? "normal" : face.weight
    }
    if (face.slant !== undefined) {
        resolved.slant =
            face.slant === "italic" && !compiled.enable_italic
                ? "normal"
                : face.slant
    }
    if (face.strike_through !== undefined) {
        resolved.strike_through = face.strike_through
    }
    if (face.extend !== undefined) resolved.extend = face.extend

    return resolved
}

export function resolve_faces(
    compiled: CompiledFaces,
    tier?: Tier
): Record<string, ResolvedFace> {
    const resolved: Record<string, ResolvedFace> = {}
    for (const name of compiled.faces.keys()) {
        const face = resolve_face(compiled, name, tier)
        if (face) resolved[name] = face
    }
    return resolved
}

/**
 * Looks up one attribute of a face, falling back to the faces it inherits
 * from in order. Inheritance cycles end the search.
 */
export function face_attribute<A extends FaceAttribute>(
    compiled: CompiledFaces,
    name: string,
    attribute: A,
    tier?: Tier,
    visited: Set<string> = new Set()
): ResolvedFace[A] | undefined {
    if (visited.has(name)) return undefined
    visited.add(name)

    const face = resolve_face(compiled, name, tier)
    if (!face) return undefined

    const value = face[attribute]
    if (value !== undefined) return value

    for (const parent of face.inherit ?? []) {
        const inherited = face_attribute(
            compiled,
            parent,
            attribute,
            tier,
            visited
        )
        if (inherited !== undefined) return inherited
    }

    return undefined
}

/** A face's spec for each display class, most capable display first */
export function display_specs(
    compiled: CompiledFaces,
    name: string
): DisplaySpec[] {
    const specs: DisplaySpec[] = []
    for (const tier of DISPLAY_TIERS) {
        const attributes = resolve_face(compiled, name, tier)
        if (!attributes) continue
        specs.push({
            display: { min_colors: tier === undefined ? 256 : tier },
            attributes,
        })
    }
    return specs
}
