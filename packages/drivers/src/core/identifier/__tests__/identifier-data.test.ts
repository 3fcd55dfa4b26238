import { InvalidIdentifierError } from "@layerconf/errors"
import { ConfigCategory, getPrimaryKeyInfo } from "../categories"
import { identifierFor } from "../create-identifier"
import { IdentifierData } from "../identifier-data"

describe("IdentifierData", () => {
  const base = {
    cogName: "music",
    uuid: "1",
    category: ConfigCategory.MEMBER,
    primaryKeyLength: 2,
  }

  it("orders the path as cog, uuid, category, primary key, identifiers", () => {
    const id = new IdentifierData({ ...base, primaryKey: ["10", "20"], identifiers: ["volume"] })

    expect(id.toPath()).toStrictEqual(["music", "1", "MEMBER", "10", "20", "volume"])
    expect(id.documentPath).toStrictEqual(["MEMBER", "10", "20", "volume"])
    expect(JSON.stringify(id)).toBe('["music","1","MEMBER","10","20","volume"]')
    expect(String(id)).toBe("music.1:MEMBER/10/20/volume")
  })

  it("accepts a partial primary key", () => {
    const id = new IdentifierData({ ...base, primaryKey: ["10"] })

    expect(id.hasFullPrimaryKey).toBe(false)
    expect(id.addPrimaryKey("20").hasFullPrimaryKey).toBe(true)
  })

  it("rejects a primary key longer than the category allows", () => {
    expect(() => new IdentifierData({ ...base, primaryKey: ["1", "2", "3"] })).toThrow(
      InvalidIdentifierError,
    )
  })

  it("rejects an empty cog name", () => {
    expect(() => new IdentifierData({ ...base, cogName: "" })).toThrow(InvalidIdentifierError)
  })

  it("returns new instances when extended", () => {
    const id = new IdentifierData({ ...base, primaryKey: ["10", "20"] })
    const extended = id.addIdentifier("a", "b")

    expect(extended).not.toBe(id)
    expect(id.identifiers).toStrictEqual([])
    expect(extended.identifiers).toStrictEqual(["a", "b"])
    expect(Object.isFrozen(extended)).toBe(true)
  })
})

describe("getPrimaryKeyInfo", () => {
  it.each([
    [ConfigCategory.GLOBAL, 0],
    [ConfigCategory.GUILD, 1],
    [ConfigCategory.CHANNEL, 1],
    [ConfigCategory.ROLE, 1],
    [ConfigCategory.USER, 1],
    [ConfigCategory.MEMBER, 2],
  ])("gives %s an arity of %i", (category, arity) => {
    expect(getPrimaryKeyInfo(category)).toStrictEqual({ isCustom: false, primaryKeyLength: arity })
  })

  it("reads custom group arity from the supplied data", () => {
    expect(getPrimaryKeyInfo("PLAYLIST", { PLAYLIST: 3 })).toStrictEqual({
      isCustom: true,
      primaryKeyLength: 3,
    })
  })

  it("builds identifiers from the registry", () => {
    const id = identifierFor({ cogName: "music", uuid: "1", category: "PLAYLIST", customGroups: { PLAYLIST: 2 } })

    expect(id.isCustom).toBe(true)
    expect(id.primaryKeyLength).toBe(2)
  })
})
