import { exclusive } from "../../adapters/exclusive/exclusive-storage"
import { InvariantError } from "../../core/errors/invariant-error"
import { borrowed, owned } from "../../core/maybe-owned"
import { fromCow, fromStorage, fromStr, intoString } from "../../core/storage/storage"
import { thrown } from "../../tests/utils/thrown"
import type { DynamicStorage, StorageStrategy } from "../storage"

export type StorageHarness<S extends DynamicStorage> = {
  name: string
  strategy: StorageStrategy<S>
  /** Whether clones share one buffer and block extraction */
  refcounted: boolean
}

export function describeStorageContract<S extends DynamicStorage>(h: StorageHarness<S>): void {
  describe(`${h.name} (DynamicStorage contract)`, () => {
    const { strategy } = h

    it("tags handles with the strategy name", () => {
      expect(strategy.fromString("value").strategy).toBe(strategy.name)
    })

    it("keeps the text of every constructor", () => {
      expect(strategy.fromString("owned").asStr()).toBe("owned")
      expect(fromStr(strategy, "slice").asStr()).toBe("slice")
      expect(fromCow(strategy, borrowed("borrowed")).asStr()).toBe("borrowed")
      expect(fromCow(strategy, owned("owned")).asStr()).toBe("owned")
      expect(strategy.fromString("").asStr()).toBe("")
      expect(strategy.fromString("ünïcødé 😀").asStr()).toBe("ünïcødé 😀")
    })

    it("extracts the string from a sole handle", () => {
      const storage = strategy.fromString("sole")
      const extracted = storage.tryExtractString()

      expect(extracted).toStrictEqual({ success: true, value: "sole" })
    })

    it("consumes the handle on extraction", () => {
      const storage = strategy.fromString("sole")
      storage.tryExtractString()

      const error = thrown(() => storage.asStr())
      expect(error).toBeInstanceOf(InvariantError)
      expect(error).toMatchObject({ code: "storage_released", isOperational: false })
    })

    it("consumes the handle on release", () => {
      const storage = strategy.fromString("released")
      storage.release()

      expect(thrown(() => storage.asStr())).toMatchObject({ code: "storage_released" })
      expect(thrown(() => storage.release())).toMatchObject({ code: "storage_released" })
    })

    it("clones keep the text", () => {
      const storage = strategy.fromString("cloned")
      const clone = strategy.clone(storage)

      expect(clone.asStr()).toBe("cloned")
      expect(clone).not.toBe(storage)
    })

    it("extraction while a clone is alive depends on sharing", () => {
      const storage = strategy.fromString("shared?")
      const clone = strategy.clone(storage)
      const extracted = storage.tryExtractString()

      if (h.refcounted) {
        expect(extracted.success).toBe(false)
        if (!extracted.success) expect(extracted.error).toBe(storage)
        expect(storage.asStr()).toBe("shared?")
      } else {
        expect(extracted.success).toBe(true)
      }
      expect(clone.asStr()).toBe("shared?")
    })

    it("extraction succeeds again once clones are released", () => {
      const storage = strategy.fromString("last one")
      strategy.clone(storage).release()

      expect(storage.tryExtractString()).toStrictEqual({ success: true, value: "last one" })
    })

    it("intoString copies out of a shared handle and releases it", () => {
      const storage = strategy.fromString("copied")
      const clone = strategy.clone(storage)

      expect(intoString(storage)).toBe("copied")
      expect(thrown(() => storage.asStr())).toMatchObject({ code: "storage_released" })
      expect(clone.tryExtractString()).toStrictEqual({ success: true, value: "copied" })
    })

    it("adopts handles of another strategy", () => {
      const other = exclusive.fromString("migrated")
      const adopted = fromStorage(strategy, other)

      expect(adopted.asStr()).toBe("migrated")
      expect(adopted.strategy).toBe(strategy.name)
      expect(thrown(() => other.asStr())).toMatchObject({ code: "storage_released" })
    })
  })
}
