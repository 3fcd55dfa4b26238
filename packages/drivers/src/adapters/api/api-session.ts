import { BackendError } from "@layerconf/errors"
import type { PayloadCodec } from "../../core/codec/payload-codec"
import type { JsonValue } from "../../ports/json-value"

export type FetchFn = (input: string, init: RequestInit) => Promise<Response>

export type ApiSessionDeps = {
  codec: PayloadCodec
  fetch?: FetchFn
}

export type ApiSessionOptions = {
  baseUrl: string
  token: string | null
}

export type ApiResponse = {
  status: number
  text: string
}

export type ApiRequest = {
  method: "POST" | "PUT"
  endpoint: string
  body?: JsonValue
  query?: Record<string, string>
}

/**
 * Shared HTTP state of an API backend. Node's global `fetch` pools
 * connections, so one session serves every driver.
 */
export class ApiSession {
  private readonly fetchFn: FetchFn

  constructor(
    private readonly deps: ApiSessionDeps,
    private readonly opts: ApiSessionOptions,
  ) {
    this.fetchFn = deps.fetch ?? ((input, init) => fetch(input, init))
  }

  get codec(): PayloadCodec {
    return this.deps.codec
  }

  get baseUrl(): string {
    return this.opts.baseUrl
  }

  async send(req: ApiRequest): Promise<ApiResponse> {
    const url = new URL(`${this.opts.baseUrl}${req.endpoint}`)
    for (const [key, value] of Object.entries(req.query ?? {})) {
      url.searchParams.set(key, value)
    }

    const headers: Record<string, string> = { "content-type": "application/json" }
    if (this.opts.token !== null) {
      headers.authorization = `Bearer ${this.opts.token}`
    }

    let response: Response
    try {
      response = await this.fetchFn(url.toString(), {
        method: req.method,
        headers,
        ...(req.body !== undefined && { body: this.deps.codec.encode(req.body) }),
      })
    } catch (err) {
      throw new BackendError(`${req.method} ${req.endpoint} failed`, { cause: err })
    }

    let text: string
    try {
      text = await response.text()
    } catch (err) {
      throw new BackendError(`Reading ${req.endpoint} response failed`, {
        status: response.status,
        cause: err,
      })
    }

    return { status: response.status, text }
  }

  decode(res: ApiResponse, endpoint: string): unknown {
    try {
      return this.deps.codec.decode(res.text)
    } catch (err) {
      throw new BackendError(`Malformed response from ${endpoint}`, {
        body: res.text,
        status: res.status,
        cause: err,
      })
    }
  }
}
