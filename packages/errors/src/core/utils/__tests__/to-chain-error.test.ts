import { ChainError } from "../../chain-error"
import { chainMessage } from "../../format/format-default"
import { toChainError } from "../to-chain-error"

describe("toChainError", () => {
  describe("ChainError input", () => {
    it("returns same instance unchanged", () => {
      const err = new ChainError("original", { code: 9 })

      expect(toChainError(err)).toBe(err)
    })

    it("ignores the fallback code", () => {
      const err = new ChainError("original", { code: 9 })

      expect(toChainError(err, 100).code).toBe(9)
    })
  })

  describe("standard Error input", () => {
    it("wraps in ChainError", () => {
      expect(toChainError(new Error("standard"))).toBeInstanceOf(ChainError)
    })

    it("names the wrapped error type in its own message", () => {
      expect(toChainError(new TypeError("original message")).message).toBe("Unexpected TypeError")
    })

    it("keeps the original message once in the chain", () => {
      expect(chainMessage(toChainError(new Error("x")))).toBe("Unexpected Error x")
    })

    it("sets original error as inner", () => {
      const err = new Error("standard")

      expect(toChainError(err).inner).toBe(err)
    })

    it("uses the default code", () => {
      expect(toChainError(new Error("standard")).code).toBe(-1)
    })

    it("uses custom fallback code when provided", () => {
      expect(toChainError(new Error("db failed"), 500).code).toBe(500)
    })

    it("captures the stack of the converting call site", () => {
      function handleFailure(err: unknown) {
        return toChainError(err)
      }

      const result = handleFailure(new Error("boom"))

      expect(result.stack.split("\n")[1]).toContain("handleFailure")
    })
  })

  describe("string input", () => {
    it("uses string as message", () => {
      const result = toChainError("something went wrong")

      expect(result.message).toBe("something went wrong")
      expect(result.inner).toBeUndefined()
    })
  })

  describe("other values", () => {
    it("inspects objects into the message", () => {
      expect(toChainError({ foo: "bar" }).message).toBe("Non-error value: { foo: 'bar' }")
    })

    it("inspects null", () => {
      expect(toChainError(null).message).toBe("Non-error value: null")
    })

    it("inspects numbers", () => {
      const result = toChainError(42, 7)

      expect(result.message).toBe("Non-error value: 42")
      expect(result.code).toBe(7)
    })
  })
})
