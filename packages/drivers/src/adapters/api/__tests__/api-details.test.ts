import { normalizeApiDetails } from "../api-details"

describe("normalizeApiDetails", () => {
  it("defaults the host", () => {
    expect(normalizeApiDetails({})).toStrictEqual({ host: "http://localhost:8000", password: null })
  })

  it("strips one trailing slash", () => {
    expect(normalizeApiDetails({ host: "https://conf.example.test/" }).host).toBe(
      "https://conf.example.test",
    )
  })

  it("maps the NONE literal to no password", () => {
    expect(normalizeApiDetails({ password: "NONE" }).password).toBeNull()
    expect(normalizeApiDetails({ password: "none" }).password).toBe("none")
    expect(normalizeApiDetails({ password: "test-secret" }).password).toBe("test-secret")
  })
})
