import { pick_tier, tier_for_display, tier_index, tier_label } from "./tier"
import { describe, it, expect } from "vitest"

describe("tier_index", () => {
    it("maps tiers through the fallback table", () => {
        expect(tier_index(256)).toBe(0)
        expect(tier_index(1)).toBe(1)
        expect(tier_index(16)).toBe(2)
        expect(tier_index(2)).toBe(3)
        expect(tier_index(8)).toBe(4)
        expect(tier_index(3)).toBe(5)
    })

    it("uses the first entry for GUI displays and unknown tiers", () => {
        expect(tier_index()).toBe(0)
        expect(tier_index(88)).toBe(0)
    })
})

describe("pick_tier", () => {
    const red = ["#ff0000", "#aa0000", "#880000"]

    it("picks the entry for the tier", () => {
        expect(pick_tier(red)).toBe("#ff0000")
        expect(pick_tier(red, 1)).toBe("#aa0000")
        expect(pick_tier(red, 16)).toBe("#880000")
    })

    it("clamps to the last entry past the end", () => {
        expect(pick_tier(red, 3)).toBe("#880000")
        expect(pick_tier(red, 8)).toBe("#880000")
    })

    it("returns scalars for every tier", () => {
        expect(pick_tier("#123456", 16)).toBe("#123456")
        expect(pick_tier([0, 0.5, 1], 8)).toEqual([0, 0.5, 1])
    })

    it("returns undefined for missing or empty colors", () => {
        expect(pick_tier(undefined, 16)).toBeUndefined()
        expect(pick_tier([], 16)).toBeUndefined()
    })
})

describe("tier_for_display", () => {
    it("treats graphical and true color displays as GUI", () => {
        expect(tier_for_display({ graphical: true })).toBeUndefined()
        expect(
            tier_for_display({ graphical: false, colors: 16777216 })
        ).toBeUndefined()
    })

    it("rounds terminal color counts down to a known tier", () => {
        expect(tier_for_display({ graphical: false, colors: 256 })).toBe(256)
        expect(tier_for_display({ graphical: false, colors: 88 })).toBe(16)
        expect(tier_for_display({ graphical: false, colors: 16 })).toBe(16)
        expect(tier_for_display({ graphical: false, colors: 8 })).toBe(8)
        expect(tier_for_display({ graphical: false, colors: 2 })).toBe(2)
    })
})

describe("tier_label", () => {
    it("names GUI and terminal tiers", () => {
        expect(tier_label()).toBe("gui")
        expect(tier_label(256)).toBe("256")
    })
})
