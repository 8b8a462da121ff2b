import { blended, darkened, ref } from "./expression"
import { FaceSpecs } from "./faces"

/** Palette entries every theme must define for the default faces to build */
export const REQUIRED_PALETTE_NAMES = [
    "bg",
    "bg_alt",
    "fg",
    "fg_alt",
    "base0",
    "base1",
    "base2",
    "base3",
    "base4",
    "base5",
    "base6",
    "base7",
    "base8",
    "grey",
    "red",
    "orange",
    "green",
    "teal",
    "yellow",
    "blue",
    "dark_blue",
    "magenta",
    "violet",
    "cyan",
    "dark_cyan",
    "highlight",
    "vertical_bar",
    "selection",
    "builtin",
    "comments",
    "doc_comments",
    "constants",
    "functions",
    "keywords",
    "methods",
    "operators",
    "type",
    "strings",
    "variables",
    "numbers",
    "region",
    "error",
    "warning",
    "success",
    "vc_modified",
    "vc_added",
    "vc_deleted",
    "modeline_bg",
    "modeline_fg",
    "modeline_bg_inactive",
    "modeline_fg_alt",
] as const

export const default_faces: FaceSpecs = {
    default: { foreground: ref("fg"), background: ref("bg") },
    bold: { weight: "bold" },
    italic: { slant: "italic" },
    bold_italic: { inherit: ["bold", "italic"] },

    // Editor chrome
    fringe: { inherit: "default", foreground: ref("base4") },
    cursor: { background: ref("highlight") },
    region: {
        background: ref("region"),
        distant_foreground: darkened(ref("fg"), 0.2),
        extend: true,
    },
    highlight: {
        background: ref("highlight"),
        foreground: ref("base0"),
        distant_foreground: ref("base8"),
    },
    hl_line: { background: ref("bg_alt"), extend: true },
    shadow: { foreground: ref("base5") },
    minibuffer_prompt: { foreground: ref("highlight") },
    tooltip: { background: ref("bg_alt"), foreground: ref("fg") },
    secondary_selection: { background: ref("grey"), extend: true },
    isearch: {
        background: ref("selection"),
        foreground: ref("base0"),
        weight: "bold",
    },
    lazy_highlight: {
        background: ref("dark_blue"),
        foreground: ref("base8"),
        distant_foreground: ref("base0"),
        weight: "bold",
    },
    match: { foreground: ref("green"), background: ref("base0"), weight: "bold" },
    trailing_whitespace: { background: ref("red") },
    vertical_border: {
        background: ref("vertical_bar"),
        foreground: ref("vertical_bar"),
    },
    link: { foreground: ref("highlight"), underline: true, weight: "bold" },
    error: { foreground: ref("error") },
    warning: { foreground: ref("warning") },
    success: { foreground: ref("success") },
    line_number: { inherit: "default", foreground: ref("base5") },
    line_number_current_line: {
        inherit: ["hl_line", "default"],
        foreground: ref("fg"),
    },
    mode_line: { background: ref("modeline_bg"), foreground: ref("modeline_fg") },
    mode_line_inactive: {
        background: ref("modeline_bg_inactive"),
        foreground: ref("modeline_fg_alt"),
    },
    show_paren_match: {
        foreground: ref("red"),
        background: darkened(ref("bg"), 0.1),
        weight: "bold",
    },
    show_paren_mismatch: { foreground: ref("base0"), background: ref("red") },

    // Syntax
    font_lock_builtin_face: { foreground: ref("builtin") },
    font_lock_comment_face: { foreground: ref("comments") },
    font_lock_doc_face: {
        inherit: "font_lock_comment_face",
        foreground: ref("doc_comments"),
    },
    font_lock_constant_face: { foreground: ref("constants") },
    font_lock_function_name_face: { foreground: ref("functions") },
    font_lock_function_call_face: { foreground: ref("methods") },
    font_lock_keyword_face: { foreground: ref("keywords") },
    font_lock_string_face: { foreground: ref("strings") },
    font_lock_type_face: { foreground: ref("type") },
    font_lock_variable_name_face: { foreground: ref("variables") },
    font_lock_number_face: { foreground: ref("numbers") },
    font_lock_operator_face: { foreground: ref("operators") },
    font_lock_warning_face: { inherit: "warning" },
    font_lock_negation_char_face: {
        inherit: "bold",
        foreground: ref("operators"),
    },

    // Version control
    diff_added: {
        inherit: "hl_line",
        foreground: ref("vc_added"),
        background: blended(ref("vc_added"), ref("bg"), 0.1),
    },
    diff_removed: {
        inherit: "hl_line",
        foreground: ref("vc_deleted"),
        background: blended(ref("vc_deleted"), ref("bg"), 0.1),
    },
    diff_changed: { inherit: "hl_line", foreground: ref("vc_modified") },
}
