import {
    ColorValue,
    DisplayFrame,
    ScalarColor,
    TieredColor,
    blend,
    darken,
    is_rgb_triple,
    is_tiered,
    lighten,
    normalize,
} from "./color"
import { UndefinedReferenceError } from "./errors"

export type ColorExpression =
    | { kind: "literal"; value: ColorValue }
    | { kind: "ref"; name: string }
    | { kind: "blend"; a: ColorExpression; b: ColorExpression; alpha: number }
    | { kind: "darken"; color: ColorExpression; alpha: number }
    | { kind: "lighten"; color: ColorExpression; alpha: number }
    | { kind: "tiered"; parts: ColorExpression[] }

/** Anywhere an expression is expected a plain color value reads as a literal */
export type ColorInput = ColorExpression | ColorValue

export interface EvaluationScope {
    /** Name of the entry being evaluated, used in error messages */
    definition: string
    has(name: string): boolean
    lookup(name: string): ColorValue | undefined
    frame?: DisplayFrame
}

export function to_expression(input: ColorInput): ColorExpression {
    if (typeof input === "string" || Array.isArray(input)) {
        return { kind: "literal", value: input }
    }
    return input
}

export const literal = (value: ColorValue): ColorExpression => ({
    kind: "literal",
    value,
})

export const ref = (name: string): ColorExpression => ({ kind: "ref", name })

export const blended = (
    a: ColorInput,
    b: ColorInput,
    alpha: number
): ColorExpression => ({
    kind: "blend",
    a: to_expression(a),
    b: to_expression(b),
    alpha,
})

export const darkened = (color: ColorInput, alpha: number): ColorExpression => ({
    kind: "darken",
    color: to_expression(color),
    alpha,
})

export const lightened = (color: ColorInput, alpha: number): ColorExpression => ({
    kind: "lighten",
    color: to_expression(color),
    alpha,
})

/**
 * Builds a tiered color out of parts. A part that is itself tiered
 * contributes its entry for the same position.
 *
 * ```ts
 * tiered(ref("red"), "#ff6655", "red")
 * ```
 */
export const tiered = (...parts: ColorInput[]): ColorExpression => ({
    kind: "tiered",
    parts: parts.map(to_expression),
})

// Validates a literal and returns a copy of its arrays
function check_literal(value: ColorValue, frame?: DisplayFrame): ColorValue {
    if (is_tiered(value)) {
        for (const color of value) normalize(color, frame)
        return value.map(copy_scalar)
    }
    normalize(value, frame)
    return copy_scalar(value)
}

function copy_scalar(color: ScalarColor): ScalarColor {
    return is_rgb_triple(color) ? [color[0], color[1], color[2]] : color
}

function at_position(value: ColorValue, ix: number): ScalarColor | undefined {
    if (!is_tiered(value)) return value
    if (value.length === 0) return undefined
    return value[Math.min(ix, value.length - 1)]
}

export function evaluate(
    expression: ColorExpression,
    scope: EvaluationScope
): ColorValue {
    switch (expression.kind) {
        case "literal":
            return check_literal(expression.value, scope.frame)
        case "ref": {
            const value = scope.has(expression.name)
                ? scope.lookup(expression.name)
                : undefined
            if (value === undefined) {
                throw new UndefinedReferenceError(
                    expression.name,
                    scope.definition
                )
            }
            return value
        }
        case "blend": {
            const a = evaluate(expression.a, scope)
            const b = evaluate(expression.b, scope)
            return blend(a, b, expression.alpha, scope.frame) ?? a
        }
        case "darken": {
            const color = evaluate(expression.color, scope)
            return darken(color, expression.alpha, scope.frame) ?? color
        }
        case "lighten": {
            const color = evaluate(expression.color, scope)
            return lighten(color, expression.alpha, scope.frame) ?? color
        }
        case "tiered": {
            const colors: TieredColor = []
            expression.parts.forEach((part, ix) => {
                const color = at_position(evaluate(part, scope), ix)
                if (color !== undefined) colors.push(color)
            })
            return colors
        }
    }
}

/** Names an expression reads, in the order they appear */
export function references(expression: ColorExpression): string[] {
    switch (expression.kind) {
        case "literal":
            return []
        case "ref":
            return [expression.name]
        case "blend":
            return [...references(expression.a), ...references(expression.b)]
        case "darken":
        case "lighten":
            return references(expression.color)
        case "tiered":
            return expression.parts.flatMap(references)
    }
}
