import { AuthenticationError } from "../core/storage-errors"

export interface S3Credentials {
  accessKeyId: string
  secretAccessKey: string
  sessionToken?: string
}

/**
 * Both key parts must be present and non-blank. The provider only checks
 * them on the first request, which is too late for a useful error.
 */
export function resolveS3Credentials(input: {
  accessKeyId?: string | undefined
  secretAccessKey?: string | undefined
  sessionToken?: string | undefined
}): S3Credentials {
  const accessKeyId = input.accessKeyId?.trim() ?? ""
  const secretAccessKey = input.secretAccessKey?.trim() ?? ""

  const missing = [
    ...(accessKeyId ? [] : ["accessKeyId"]),
    ...(secretAccessKey ? [] : ["secretAccessKey"]),
  ]

  if (missing.length > 0) {
    throw AuthenticationError.missingCredentials("s3", missing)
  }

  const sessionToken = input.sessionToken?.trim()

  return {
    accessKeyId,
    secretAccessKey,
    ...(sessionToken && { sessionToken }),
  }
}
