import type { ObjectRef } from "../ports/storage-object"

/**
 * Client-wide key prefix. Prepended to every key sent to the provider and
 * stripped from every key returned, so callers never see it.
 */
export class Keyspace {
  readonly prefix: string

  constructor(prefix = "") {
    this.prefix = prefix && !prefix.endsWith("/") ? `${prefix}/` : prefix
  }

  apply(key: string): string {
    return `${this.prefix}${key}`
  }

  applyRef(ref: ObjectRef): ObjectRef {
    return { bucket: ref.bucket, key: this.apply(ref.key) }
  }

  contains(key: string): boolean {
    return key.startsWith(this.prefix)
  }

  strip(key: string): string {
    return this.contains(key) ? key.slice(this.prefix.length) : key
  }

  /** Provider-side list prefix for a caller prefix, or undefined for "everything". */
  listPrefix(prefix?: string): string | undefined {
    const full = this.apply(prefix ?? "")
    return full || undefined
  }
}
