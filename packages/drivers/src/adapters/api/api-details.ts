export type ApiDetails = {
  host: string
  /** `null` when the server takes no password. */
  password: string | null
}

export const DEFAULT_API_HOST = "http://localhost:8000"

/** Literal that stands for "no password" in stored connection details. */
export const NO_PASSWORD = "NONE"

export function normalizeApiDetails(input: { host?: string; password?: string | null }): ApiDetails {
  let host = input.host?.trim() || DEFAULT_API_HOST
  if (host.endsWith("/")) host = host.slice(0, -1)

  const password = input.password === NO_PASSWORD || input.password === "" ? null : (input.password ?? null)

  return { host, password }
}
