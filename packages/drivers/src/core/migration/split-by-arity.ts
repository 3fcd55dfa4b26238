import { isJsonObject, type JsonValue } from "../../ports/json-value"

export type SplitLeaf =
  | { kind: "leaf"; primaryKey: string[]; data: JsonValue }
  | { kind: "malformed"; primaryKey: string[]; data: JsonValue }

/**
 * Walks `arity` levels of object keys below a category payload. Each node at
 * depth `arity` becomes a leaf; a non-object met before that depth is
 * reported as malformed.
 */
export function* splitByArity(
  payload: JsonValue,
  arity: number,
  prefix: string[] = [],
): Generator<SplitLeaf> {
  if (prefix.length === arity) {
    yield { kind: "leaf", primaryKey: prefix, data: payload }
    return
  }

  if (!isJsonObject(payload)) {
    yield { kind: "malformed", primaryKey: prefix, data: payload }
    return
  }

  for (const [key, child] of Object.entries(payload)) {
    yield* splitByArity(child, arity, [...prefix, key])
  }
}
