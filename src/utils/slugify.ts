export function slugify(text: string): string {
    const special_chars = /[^\w\s-]/gi // Anything that is not a word character, whitespace or a dash
    const spaces = /\s+/g

    const cleaned_text = text.trim().replace(special_chars, "")

    return cleaned_text.replace(spaces, "_").toLowerCase()
}
