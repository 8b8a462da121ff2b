export const NO_ACTIVE_THEME_ERROR = "Tried to use theme before it was loaded"
export const BUILDER_SEALED_ERROR =
    "A color table can not be extended after it has been built."

export type ThemeErrorKind =
    | "InvalidColor"
    | "UndefinedReference"
    | "ConstructionFailure"

export class InvalidColorError extends Error {
    readonly kind: ThemeErrorKind = "InvalidColor"

    constructor(readonly color: unknown) {
        super(`Invalid color: ${JSON.stringify(color)}`)
        this.name = "InvalidColorError"
    }
}

export class UndefinedReferenceError extends Error {
    readonly kind: ThemeErrorKind = "UndefinedReference"

    /**
     * @param reference The name that was looked up
     * @param definition The entry being evaluated when the lookup failed
     */
    constructor(readonly reference: string, readonly definition: string) {
        super(
            `"${definition}" references "${reference}", which is not defined before it`
        )
        this.name = "UndefinedReferenceError"
    }
}

export class ConstructionFailureError extends Error {
    readonly kind: ThemeErrorKind = "ConstructionFailure"

    constructor(readonly theme: string, readonly cause: Error) {
        super(`Theme ${theme} could not be built: ${cause.message}`)
        this.name = "ConstructionFailureError"
    }
}
