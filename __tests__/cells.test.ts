import { formatDateTime, isMissing, parseDate, parseNumber, toDisplayString } from "@/lib/cells"
import type { Cell } from "@/lib/types"

const dateOf = (v: Cell) => {
  const parsed = parseDate(v)
  return parsed.ok ? formatDateTime(parsed.value) : null
}

const numberOf = (v: Cell) => {
  const parsed = parseNumber(v)
  return parsed.ok ? parsed.value : null
}

describe("cells", () => {
  describe("isMissing", () => {
    it("treats null, undefined, NaN and invalid dates as missing", () => {
      expect(isMissing(null)).toBe(true)
      expect(isMissing(undefined)).toBe(true)
      expect(isMissing(Number.NaN)).toBe(true)
      expect(isMissing(new Date("not a date"))).toBe(true)
    })

    it("keeps real values, including empty strings and zero", () => {
      expect(isMissing("")).toBe(false)
      expect(isMissing(0)).toBe(false)
      expect(isMissing(false)).toBe(false)
    })
  })

  describe("parseDate", () => {
    it("reads ISO dates and date-times as local time", () => {
      expect(dateOf("2024-01-15")).toBe("2024-01-15T00:00:00")
      expect(dateOf("2024-01-15T08:30:00")).toBe("2024-01-15T08:30:00")
      expect(dateOf("2024-01-15 08:30")).toBe("2024-01-15T08:30:00")
    })

    it("reads common non-ISO layouts", () => {
      expect(dateOf("2024/03/05")).toBe("2024-03-05T00:00:00")
      expect(dateOf("03/05/2024")).toBe("2024-03-05T00:00:00")
      expect(dateOf("5 Jan 2024")).toBe("2024-01-05T00:00:00")
      expect(dateOf("Jan 5, 2024")).toBe("2024-01-05T00:00:00")
    })

    it("accepts valid Date instances", () => {
      expect(dateOf(new Date(2024, 1, 29, 12, 0, 0))).toBe("2024-02-29T12:00:00")
    })

    it("never reads numbers or numeric strings as dates", () => {
      expect(dateOf(45000)).toBeNull()
      expect(dateOf("2024")).toBeNull()
      expect(dateOf("20240101")).toBeNull()
      expect(dateOf("12")).toBeNull()
    })

    it("fails without throwing on anything else", () => {
      expect(dateOf("hello")).toBeNull()
      expect(dateOf("")).toBeNull()
      expect(dateOf(true)).toBeNull()
      expect(dateOf(null)).toBeNull()
      expect(dateOf(new Date("nope"))).toBeNull()
      expect(dateOf("2024-13-45")).toBeNull()
    })
  })

  describe("parseNumber", () => {
    it("reads finite numbers and numeric strings", () => {
      expect(numberOf(7)).toBe(7)
      expect(numberOf("3.5")).toBe(3.5)
      expect(numberOf(" 42 ")).toBe(42)
      expect(numberOf("1e3")).toBe(1000)
      expect(numberOf("-.5")).toBe(-0.5)
    })

    it("rejects everything else", () => {
      expect(numberOf("12abc")).toBeNull()
      expect(numberOf("")).toBeNull()
      expect(numberOf(Number.POSITIVE_INFINITY)).toBeNull()
      expect(numberOf(Number.NaN)).toBeNull()
      expect(numberOf(true)).toBeNull()
      expect(numberOf(new Date(2024, 0, 1))).toBeNull()
    })
  })

  describe("toDisplayString", () => {
    it("renders each cell kind as a string", () => {
      expect(toDisplayString(null)).toBe("")
      expect(toDisplayString(Number.NaN)).toBe("")
      expect(toDisplayString(new Date(2024, 0, 2, 3, 4, 5))).toBe("2024-01-02T03:04:05")
      expect(toDisplayString(1.5)).toBe("1.5")
      expect(toDisplayString(false)).toBe("false")
      expect(toDisplayString("abc")).toBe("abc")
    })
  })
})
