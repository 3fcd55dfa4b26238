export type RedisMulti = {
  set(key: string, value: string): RedisMulti
  del(keys: string | readonly string[]): RedisMulti
  sAdd(key: string, members: string | readonly string[]): RedisMulti
  sRem(key: string, members: string | readonly string[]): RedisMulti
  exec(): Promise<unknown>
}

/** The subset of a node-redis client the document store uses. */
export type RedisDocumentClient = {
  get(key: string): Promise<string | null>
  del(keys: string | readonly string[]): Promise<number>
  sMembers(key: string): Promise<string[]>

  multi(): RedisMulti

  connect(): Promise<unknown>
  quit(): Promise<unknown>
  isOpen: boolean
}
