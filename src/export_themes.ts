import * as fs from "fs"
import { tmpdir } from "os"
import * as path from "path"
import {
    DISPLAY_TIERS,
    ResolvedFace,
    ScalarColor,
    Theme,
    ThemeAppearance,
    Tier,
    resolve_faces,
    tier_label,
} from "./theme"
import { slugify } from "./utils/slugify"

export interface ThemeExport {
    name: string
    appearance: ThemeAppearance
    tier: string
    colors: Record<string, ScalarColor>
    faces: Record<string, ResolvedFace>
}

export function theme_to_json(theme: Theme, tier?: Tier): ThemeExport {
    const colors: Record<string, ScalarColor> = {}
    for (const name of theme.table.names()) {
        const color = theme.table.resolve(name, tier)
        if (color !== undefined) colors[name] = color
    }

    return {
        name: theme.name,
        appearance: theme.appearance,
        tier: tier_label(tier),
        colors,
        faces: resolve_faces(theme.faces, tier),
    }
}

export function theme_file_name(theme: Theme, tier?: Tier): string {
    const slug = slugify(theme.name)
    return tier === undefined ? `${slug}.json` : `${slug}-${tier}.json`
}

/** Creates the output directory, or drops the JSON left there by an earlier run */
function prepare_output_directory(directory: string) {
    fs.mkdirSync(directory, { recursive: true })
    fs.readdirSync(directory)
        .filter((entry) => path.extname(entry) === ".json")
        .forEach((entry) => fs.rmSync(path.join(directory, entry)))
}

/** Writes one JSON file per theme and tier, returning the paths written */
export function write_themes(
    themes: Theme[],
    output_directory: string,
    tiers: readonly Tier[] = DISPLAY_TIERS
): string[] {
    const temp_directory = fs.mkdtempSync(path.join(tmpdir(), "build-themes"))
    const written: string[] = []

    prepare_output_directory(output_directory)
    try {
        for (const theme of themes) {
            for (const tier of tiers) {
                const file_name = theme_file_name(theme, tier)
                const theme_json = JSON.stringify(theme_to_json(theme, tier), null, 2)
                const temp_path = path.join(temp_directory, file_name)
                const out_path = path.join(output_directory, file_name)
                fs.writeFileSync(temp_path, theme_json)
                fs.copyFileSync(temp_path, out_path)
                written.push(out_path)
            }
        }
    } finally {
        fs.rmSync(temp_directory, { recursive: true, force: true })
    }

    return written
}
