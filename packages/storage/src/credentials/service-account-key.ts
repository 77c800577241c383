import { readFileSync } from "node:fs"
import { z } from "zod"
import { AuthenticationError } from "../core/storage-errors"

export const serviceAccountKeySchema = z.looseObject({
  type: z.string().optional(),
  project_id: z.string().optional(),
  client_email: z.string().min(1),
  private_key: z.string().min(1),
})

/** Google service-account JSON key. Unknown fields are kept. */
export type ServiceAccountKey = z.infer<typeof serviceAccountKeySchema>

export function parseServiceAccountKey(value: unknown): ServiceAccountKey {
  const result = serviceAccountKeySchema.safeParse(value)

  if (!result.success) {
    throw AuthenticationError.invalidKey(z.prettifyError(result.error), result.error)
  }

  return result.data
}

/**
 * Base64 of the key JSON, the form expected in `SERVICE_KEY_CONTENT`.
 * Takes a key object, its JSON text, or the path of a key file. The key is
 * validated before encoding.
 */
export function encodeServiceAccountKey(key: ServiceAccountKey | string): string {
  const validated =
    typeof key !== "string"
      ? parseServiceAccountKey(key)
      : key.trim().startsWith("{")
        ? parseServiceAccountKeyJson(key)
        : readServiceAccountKeyFile(key)

  return Buffer.from(JSON.stringify(validated), "utf8").toString("base64")
}

export function decodeServiceAccountKey(encoded: string): ServiceAccountKey {
  const json = Buffer.from(encoded.trim(), "base64").toString("utf8")

  return parseServiceAccountKeyJson(json, "content is not base64-encoded JSON")
}

export function readServiceAccountKeyFile(path: string): ServiceAccountKey {
  let parsed: unknown
  try {
    parsed = JSON.parse(readFileSync(path, "utf8"))
  } catch (err) {
    throw AuthenticationError.invalidKeyFile(path, err)
  }

  try {
    return parseServiceAccountKey(parsed)
  } catch (err) {
    throw AuthenticationError.invalidKeyFile(path, err)
  }
}

function parseServiceAccountKeyJson(json: string, reason = "content is not JSON"): ServiceAccountKey {
  let parsed: unknown
  try {
    parsed = JSON.parse(json)
  } catch (err) {
    throw AuthenticationError.invalidKey(reason, err)
  }

  return parseServiceAccountKey(parsed)
}
