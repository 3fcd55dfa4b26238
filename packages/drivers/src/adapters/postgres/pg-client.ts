export type PgQueryResult = { rows: Array<Record<string, unknown>> }

export type PgQueryable = {
  query: (sql: string, params?: unknown[]) => Promise<PgQueryResult>
}

export type PgPoolClient = PgQueryable & {
  release: (err?: Error | boolean) => void
}

/** The subset of `pg.Pool` the store uses. */
export type PgPool = PgQueryable & {
  connect: () => Promise<PgPoolClient>
  end: () => Promise<void>
}
