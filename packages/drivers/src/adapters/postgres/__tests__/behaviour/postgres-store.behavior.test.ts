import { BackendError } from "@layerconf/errors"
import { mock } from "vitest-mock-extended"
import type { PgPool, PgPoolClient } from "../../pg-client"
import { PostgresStore } from "../../postgres-store"

const ns = { cogName: "music", uuid: "1" }

describe("PostgresStore (behavior)", () => {
  it("creates its table on open", async () => {
    const pool = mock<PgPool>()
    pool.query.mockResolvedValue({ rows: [] })

    await new PostgresStore({ pool }).open()

    expect(pool.query).toHaveBeenCalledWith(
      expect.stringContaining("create table if not exists layerconf_documents"),
    )
  })

  it("locks the row and commits the new document", async () => {
    const client = mock<PgPoolClient>()
    const pool = mock<PgPool>()
    pool.connect.mockResolvedValue(client)
    client.query.mockImplementation(async (sql) =>
      sql.includes("for update") ? { rows: [{ document: { GLOBAL: { a: 1 } } }] } : { rows: [] },
    )

    const result = await new PostgresStore({ pool }).mutate(ns, (doc) => {
      doc.GLOBAL = { a: 2 }
      return "done"
    })

    expect(result).toBe("done")
    const statements = client.query.mock.calls.map(([sql]) => sql.trim().split(/\s+/)[0])
    expect(statements).toStrictEqual(["begin", "select", "insert", "commit"])
    expect(client.query.mock.calls[2]?.[1]).toStrictEqual(["music", "1", '{"GLOBAL":{"a":2}}'])
    expect(client.release).toHaveBeenCalledTimes(1)
  })

  it("deletes the row when the document ends up empty", async () => {
    const client = mock<PgPoolClient>()
    const pool = mock<PgPool>()
    pool.connect.mockResolvedValue(client)
    client.query.mockResolvedValue({ rows: [] })

    await new PostgresStore({ pool }).mutate(ns, () => undefined)

    const statements = client.query.mock.calls.map(([sql]) => sql.trim().split(/\s+/)[0])
    expect(statements).toStrictEqual(["begin", "select", "delete", "commit"])
  })

  it("rolls back and releases when the mutation throws", async () => {
    const client = mock<PgPoolClient>()
    const pool = mock<PgPool>()
    pool.connect.mockResolvedValue(client)
    client.query.mockResolvedValue({ rows: [] })

    await expect(
      new PostgresStore({ pool }).mutate(ns, () => {
        throw new Error("boom")
      }),
    ).rejects.toThrow("boom")

    const statements = client.query.mock.calls.map(([sql]) => sql.trim().split(/\s+/)[0])
    expect(statements).toStrictEqual(["begin", "select", "rollback"])
    expect(client.release).toHaveBeenCalledTimes(1)
  })

  it("rejects a stored document that is not an object", async () => {
    const pool = mock<PgPool>()
    pool.query.mockResolvedValue({ rows: [{ document: [1, 2] }] })

    await expect(new PostgresStore({ pool }).read(ns)).rejects.toBeInstanceOf(BackendError)
  })

  it("rejects unsafe table names", () => {
    expect(() => new PostgresStore({ pool: mock<PgPool>() }, { table: "docs; drop table x" })).toThrow(
      RangeError,
    )
  })

  it("leaves a shared pool open on close", async () => {
    const pool = mock<PgPool>()

    await new PostgresStore({ pool }, { ownsPool: false }).close()

    expect(pool.end).not.toHaveBeenCalled()
  })
})
