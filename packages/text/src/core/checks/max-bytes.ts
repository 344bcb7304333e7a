import type { Check } from "../../ports/check"
import { CheckError } from "../errors/check-error"
import { err, passed } from "../result"

export class MaxBytesError extends CheckError<"max_bytes"> {
  readonly max: number
  /** UTF-8 byte length of the rejected value */
  readonly length: number

  constructor(max: number, length: number) {
    super(`length of ${length} exceeds limit of ${max}`, {
      code: "max_bytes",
      context: { max, length },
    })
    this.max = max
    this.length = length
  }
}

export function maxBytes<N extends number>(max: N): Check<MaxBytesError, `MaxBytes${N}`> {
  return {
    name: `MaxBytes${max}`,
    check(value) {
      const length = Buffer.byteLength(value, "utf8")

      return length > max ? err(new MaxBytesError(max, length)) : passed
    },
  }
}

export const MaxBytes256 = maxBytes(256)
export const MaxBytes512 = maxBytes(512)
export const MaxBytes1024 = maxBytes(1024)
