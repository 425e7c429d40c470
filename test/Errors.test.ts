import { describe, it, expect } from "@effect/vitest"
import { Effect } from "effect"
import {
  AbbreviationNotFoundError,
  DivisionByZeroError,
  NoCompositeGrammarError,
  OperatorNetworkError,
  OperatorNotDefinedError,
  ParseFailure,
  QuantityFormatError,
  UnitNotFoundError,
  UnitTableError,
} from "../src/Errors.js"

describe("quantity error hierarchy", () => {
  it("formats unit lookup messages", () => {
    expect(new UnitNotFoundError({ quantityType: "Length", unit: "Furlong" }).message).toBe(
      `Unknown Length unit "Furlong"`,
    )
    expect(new AbbreviationNotFoundError({ quantityType: "Length", unit: "Meter", culture: "en-US" }).message).toBe(
      "No abbreviation for Length unit Meter in culture en-US",
    )
  })

  it("formats parse failures with the number of patterns tried", () => {
    const failure = new ParseFailure({
      text: "garbage",
      quantityType: "Mass",
      culture: "en-US",
      attempts: [
        { target: "Gram", pattern: "^g$" },
        { target: "Tonne", pattern: undefined },
      ],
    })

    expect(failure.message).toBe(`"garbage" is not a Mass in culture en-US (2 patterns tried)`)
    expect(
      new QuantityFormatError({ text: "garbage", quantityType: "Mass", culture: "en-US", attempts: [] }).message,
    ).toBe(`Unable to parse "garbage" as Mass`)
  })

  it("names the missing grammar when one was requested", () => {
    expect(new NoCompositeGrammarError({ quantityType: "Mass", grammar: undefined }).message).toBe(
      "Mass has no composite grammar",
    )
    expect(new NoCompositeGrammarError({ quantityType: "Length", grammar: "Stones" }).message).toBe(
      "Length has no composite grammar named Stones",
    )
  })

  it("formats operator errors", () => {
    expect(new DivisionByZeroError({ dividend: "Area", divisor: "Length" }).message).toBe(
      "Cannot divide Area by a zero Length",
    )
    expect(new OperatorNotDefinedError({ operator: "multiply", left: "Mass", right: "Length" }).message).toBe(
      "No rule to multiply Mass by Length",
    )
    expect(new OperatorNetworkError({ conflicts: ["a", "b"] }).message).toBe("Inconsistent operator network: a; b")
    expect(new UnitTableError({ reason: "empty" }).message).toBe("Invalid unit definition table: empty")
  })

  it.effect("supports catchTag on QuantityFormatError", () =>
    Effect.gen(function* () {
      const handled = yield* Effect.fail(
        new QuantityFormatError({ text: "x", quantityType: "Angle", culture: "nb-NO", attempts: [] }),
      ).pipe(
        Effect.catchTag("QuantityFormatError", (error) => {
          expect(error.quantityType).toBe("Angle")
          expect(error.culture).toBe("nb-NO")
          return Effect.succeed("handled")
        }),
      )

      expect(handled).toBe("handled")
    }))
})
