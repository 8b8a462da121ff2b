import * as path from "path"
import { write_themes } from "./export_themes"
import { Theme, create_theme } from "./theme"
import { themes } from "./themes"

const output_directory = path.resolve(
    process.argv[2] ?? `${__dirname}/../assets/themes`
)

const all_themes: Theme[] = themes.map((theme) => create_theme(theme))

for (const out_path of write_themes(all_themes, output_directory)) {
    console.log(`- ${out_path} created`)
}
