import { createStore } from "zustand/vanilla"
import { ScalarColor } from "./color"
import { Theme, create_theme } from "./create_theme"
import { ConstructionFailureError, NO_ACTIVE_THEME_ERROR } from "./errors"
import { ThemeConfig, ThemeSettings } from "./theme_config"
import { Tier } from "./tier"

type ThemeState = {
    theme: Theme | undefined
    set_theme: (theme: Theme | undefined) => void
}

export type ThemeListener = (
    theme: Theme | undefined,
    previous: Theme | undefined
) => void

export interface ThemeRegistry {
    /**
     * Builds `config` and makes it the active theme. If building fails the
     * previously active theme stays active and a `ConstructionFailureError`
     * is thrown.
     */
    activate: (config: ThemeConfig, settings?: ThemeSettings) => Theme
    /** Resolves a palette name against the active theme */
    resolve: (name: string, tier?: Tier) => ScalarColor | undefined
    use_theme: () => Theme
    is_active: () => boolean
    teardown: () => void
    subscribe: (listener: ThemeListener) => () => void
}

export function create_theme_registry(): ThemeRegistry {
    const store = createStore<ThemeState>((set) => ({
        theme: undefined,
        set_theme: (theme) => set(() => ({ theme })),
    }))

    const use_theme = (): Theme => {
        const { theme } = store.getState()

        if (!theme) throw new Error(NO_ACTIVE_THEME_ERROR)

        return theme
    }

    const activate = (config: ThemeConfig, settings?: ThemeSettings): Theme => {
        let theme: Theme
        try {
            theme = create_theme(config, settings)
        } catch (error) {
            throw new ConstructionFailureError(
                config.name,
                error instanceof Error ? error : new Error(String(error))
            )
        }

        store.getState().set_theme(theme)
        return theme
    }

    return {
        activate,
        resolve: (name, tier) => use_theme().table.resolve(name, tier),
        use_theme,
        is_active: () => store.getState().theme !== undefined,
        teardown: () => store.getState().set_theme(undefined),
        subscribe: (listener) =>
            store.subscribe((state, previous) => {
                if (state.theme !== previous.theme) {
                    listener(state.theme, previous.theme)
                }
            }),
    }
}
