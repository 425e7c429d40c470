import { describe, it, expect } from "vitest"
import { alternation, compile, escapeRegExp } from "../../src/internal/regex.js"

describe("regex helpers", () => {
  it("escapes every syntax character", () => {
    expect(escapeRegExp("gal (U.S.)")).toBe("gal \\(U\\.S\\.\\)")
    expect(escapeRegExp("N*m")).toBe("N\\*m")
    expect(escapeRegExp("a|b^$")).toBe("a\\|b\\^\\$")
  })

  it("joins escaped literals into an alternation", () => {
    expect(alternation(["m/s", "m.s"])).toBe("m/s|m\\.s")
  })

  it("compiles in unicode mode", () => {
    const pattern = compile("^.$")
    expect(pattern.flags).toBe("u")
    expect(pattern.test("″")).toBe(true)
  })
})
