import { createStatusFilter } from "../status-filter"

describe("createStatusFilter", () => {
  it("accepts every status when the allow-list is empty", () => {
    const accepts = createStatusFilter([])

    expect(accepts(200)).toBe(true)
    expect(accepts(404)).toBe(true)
    expect(accepts(503)).toBe(true)
  })

  it("accepts only listed statuses", () => {
    const accepts = createStatusFilter([200, 201])

    expect(accepts(200)).toBe(true)
    expect(accepts(201)).toBe(true)
    expect(accepts(404)).toBe(false)
    expect(accepts(500)).toBe(false)
  })

  it("takes any iterable", () => {
    const accepts = createStatusFilter(new Set([418]))

    expect(accepts(418)).toBe(true)
    expect(accepts(200)).toBe(false)
  })
})
