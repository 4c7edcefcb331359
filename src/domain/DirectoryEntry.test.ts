import { describe, expect, test } from "vitest"
import { Either } from "effect"
import { deriveName, describeMalformedName, toEntries, MalformedEntryName } from "./DirectoryEntry"

const derived = (name: string) => Either.getOrNull(deriveName(name))

describe("deriveName", () => {
  test("keeps the segment after the first delimiter", () => {
    expect(derived("A-B")).toBe("B")
    expect(derived("01-C4.wav")).toBe("C4.wav")
  })

  test("discards everything after the second delimiter", () => {
    expect(derived("A-B-C")).toBe("B")
    expect(derived("x-foo-bar-baz")).toBe("foo")
  })

  test("names without a delimiter are malformed", () => {
    const result = deriveName("y")

    expect(Either.isLeft(result)).toBe(true)
    if (Either.isLeft(result)) {
      expect(result.left._tag).toBe("MalformedEntryName")
      expect(result.left.entryName).toBe("y")
      expect(result.left.reason).toBe("MissingDelimiter")
    }
  })

  test("an empty second segment is malformed", () => {
    const trailing = deriveName("a-")
    const doubled = deriveName("a--b")

    expect(Either.isLeft(trailing)).toBe(true)
    expect(Either.isLeft(doubled)).toBe(true)
    if (Either.isLeft(doubled)) {
      expect(doubled.left.reason).toBe("EmptyToken")
    }
  })

  test("dot segments are malformed", () => {
    for (const name of ["a-.", "b-..", "c-..-rest"]) {
      const result = deriveName(name)

      expect(Either.isLeft(result)).toBe(true)
      if (Either.isLeft(result)) {
        expect(result.left.reason).toBe("DotSegment")
      }
    }
    expect(derived("a-.wav")).toBe(".wav")
  })

  test("a leading delimiter keeps what follows it", () => {
    expect(derived("-B")).toBe("B")
  })
})

describe("describeMalformedName", () => {
  test("names the offending entry", () => {
    expect(
      describeMalformedName(new MalformedEntryName({ entryName: "y", reason: "MissingDelimiter" }))
    ).toBe(`"y" has no "-" to split on`)
    expect(
      describeMalformedName(new MalformedEntryName({ entryName: "a-", reason: "EmptyToken" }))
    ).toBe(`"a-" has an empty segment after the first "-"`)
    expect(
      describeMalformedName(new MalformedEntryName({ entryName: "b-..", reason: "DotSegment" }))
    ).toBe(`"b-.." would be renamed to a directory reference`)
  })
})

test("toEntries preserves listing order", () => {
  expect(toEntries(["z-1", "a-2"])).toEqual([{ oldName: "z-1" }, { oldName: "a-2" }])
})
