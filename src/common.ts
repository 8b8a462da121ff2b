import { FontSlant, FontWeight } from "./theme"
export * from "./theme"

export const font_weights: { [key: string]: FontWeight } = {
    normal: "normal",
    bold: "bold",
}

export const font_slants: { [key: string]: FontSlant } = {
    normal: "normal",
    italic: "italic",
}
