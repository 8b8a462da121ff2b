export * from "./color"
export * from "./color_table"
export * from "./create_theme"
export * from "./default_faces"
export * from "./errors"
export * from "./expression"
export * from "./faces"
export * from "./registry"
export * from "./theme_config"
export * from "./tier"
