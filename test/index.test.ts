import { describe, it, expect } from "vitest"
import * as QuantityAlgebra from "../src/index.js"

describe("public API export surface", () => {
  it("exposes core modules", () => {
    expect(QuantityAlgebra).toHaveProperty("QuantityEngine")
    expect(QuantityAlgebra).toHaveProperty("QuantityEngineConfig")
    expect(QuantityAlgebra).toHaveProperty("QuantityFormatError")
    expect(QuantityAlgebra).toHaveProperty("QuantityTypeName")
    expect(QuantityAlgebra.Parser).toHaveProperty("tryParse")
    expect(QuantityAlgebra.Parser).toHaveProperty("parseComposite")
    expect(QuantityAlgebra.Operators).toHaveProperty("makeOperatorNetwork")
    expect(QuantityAlgebra.Abbreviations).toHaveProperty("unitsFor")
    expect(QuantityAlgebra.Patterns).toHaveProperty("buildUnitPattern")
    expect(QuantityAlgebra.UnitTable).toHaveProperty("loadUnitTable")
    expect(QuantityAlgebra.FeetInches).toHaveProperty("formatFeetInches")
  })
})
