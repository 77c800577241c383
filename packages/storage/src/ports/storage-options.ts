export interface PutOptions {
  contentType?: string
  metadata?: Record<string, string>
}

export interface ListOptions {
  /** Only objects whose key starts with this prefix ("users/123/") */
  prefix?: string

  /** Max objects per page */
  maxKeys?: number

  /** Opaque token from a previous ListResult */
  cursor?: string
}
