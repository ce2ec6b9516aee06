import { describe, expect, test } from "vitest"
import { formatSize } from "./formatSize"

describe("formatSize", () => {
  test("formats each unit", () => {
    expect(formatSize(512)).toBe("512 B")
    expect(formatSize(1536)).toBe("1.5 KB")
    expect(formatSize(50 * 1024 * 1024)).toBe("50.0 MB")
    expect(formatSize(1.5 * 1024 * 1024 * 1024)).toBe("1.50 GB")
    expect(formatSize(2 * 1024 * 1024 * 1024 * 1024)).toBe("2.00 TB")
  })

  test("keeps the sign of negative sizes", () => {
    expect(formatSize(-2048)).toBe("-2.0 KB")
  })
})
