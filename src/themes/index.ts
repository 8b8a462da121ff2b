import { ThemeConfig } from "../theme"
import { theme as one_dark } from "./one/one-dark"
import { theme as one_light } from "./one/one-light"

export const themes: ThemeConfig[] = [one_dark, one_light]
