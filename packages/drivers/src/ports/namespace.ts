/**
 * Storage unit of the document backends: one cog instance.
 */
export type Namespace = {
  cogName: string
  uuid: string
}

/** Unambiguous for any pair of strings, dots included. */
export function namespaceKey(ns: Namespace): string {
  return JSON.stringify([ns.cogName, ns.uuid])
}
